// CHANGE: Category filter rules (`+prefix` / `-prefix`)
// WHY: Enabling and disabling categories is pure data resolved once per run
// PURITY: CORE
// INVARIANT: Rules apply in order; the last rule whose prefix matches decides
// COMPLEXITY: O(r) per category query where r = number of rules

import { Effect } from "effect";

import { InvalidFilter, UnknownCategory } from "../errors.js";
import type { FilterRule } from "../types/index.js";

/**
 * Rules applied before any user-supplied filter.
 */
export const DEFAULT_FILTERS: readonly FilterRule[] = [
	{ sign: "-", prefix: "build/include_alpha" },
];

const splitEntries = (entries: string | readonly string[]): readonly string[] =>
	(typeof entries === "string" ? entries.split(",") : entries.flatMap((s) => s.split(",")))
		.map((entry) => entry.replace(/\s+/g, ""))
		.filter((entry) => entry.length > 0);

/**
 * Parse one filter entry and check its prefix against the known categories.
 *
 * @pure true
 * @effect Effect<FilterRule, InvalidFilter | UnknownCategory>
 */
export const parseFilterEntry = (
	entry: string,
	known: readonly string[],
): Effect.Effect<FilterRule, InvalidFilter | UnknownCategory> => {
	const sign = entry.charAt(0);
	if (sign !== "+" && sign !== "-") {
		return Effect.fail(new InvalidFilter({ entry }));
	}
	const prefix = entry.slice(1);
	return known.some((category) => category.startsWith(prefix))
		? Effect.succeed({ sign, prefix })
		: Effect.fail(new UnknownCategory({ category: prefix }));
};

/**
 * Parse a comma-separated filter specification (or a list of them).
 *
 * Whitespace anywhere in an entry is ignored, empty entries are skipped and
 * the first malformed entry fails the whole parse.
 *
 * @pure true
 * @effect Effect<readonly FilterRule[], InvalidFilter | UnknownCategory>
 *
 * @example
 * ```ts
 * Effect.runSync(parseFilters("-whitespace, +whitespace/tab", KNOWN_CATEGORIES));
 * // [{ sign: "-", prefix: "whitespace" }, { sign: "+", prefix: "whitespace/tab" }]
 * ```
 */
export const parseFilters = (
	entries: string | readonly string[],
	known: readonly string[],
): Effect.Effect<readonly FilterRule[], InvalidFilter | UnknownCategory> =>
	Effect.forEach(splitEntries(entries), (entry) => parseFilterEntry(entry, known));

/**
 * Whether a category survives the rule list.
 *
 * @pure true
 * @invariant rules = [] ⇒ true
 * @complexity O(r)
 */
export function isCategoryEnabled(
	rules: readonly FilterRule[],
	category: string,
): boolean {
	let enabled = true;
	for (const rule of rules) {
		if (category.startsWith(rule.prefix)) enabled = rule.sign === "+";
	}
	return enabled;
}
