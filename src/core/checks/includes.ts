// CHANGE: Include grouping, ordering, duplication and naming checks
// WHY: Include order is a section-local property reset by conditional compilation
// PURITY: CORE
// INVARIANT: A conditional directive starts a new include section
// INVARIANT: Includes from mutually exclusive #if/#else branches are never duplicates of each other
// COMPLEXITY: O(n) over the lines, O(k·d²) per include seen k times under d conditionals

import { match } from "ts-pattern";

import { snapshotAt } from "../nesting/index.js";
import { extensionOf } from "../source.js";
import {
	type ConditionalFrame,
	type Finding,
	finding,
	type IncludeGroup,
} from "../types/index.js";
import { type HeaderCatalog, headerCatalog } from "./catalog.js";
import type { Checker, FileContext, IncludeDirective } from "./types.js";

const CONDITIONAL = /^\s*#\s*(if|ifdef|ifndef|elif|else|endif)\b/;

/**
 * Human name of an include group, as used in ordering messages.
 *
 * @pure true
 */
export const groupLabel = (group: IncludeGroup): string =>
	match(group)
		.with("own", () => "header this file implements")
		.with("c_system", () => "C system header")
		.with("cpp_system", () => "C++ system header")
		.with("project", () => "other header")
		.with("third_party", () => "other system header")
		.exhaustive();

const stem = (path: string): string => {
	const base = path.slice(path.lastIndexOf("/") + 1);
	const dot = base.lastIndexOf(".");
	return (dot <= 0 ? base : base.slice(0, dot)).replace(/(?:-inl|_test|_unittest)$/, "");
};

/**
 * Decide which group an include belongs to.
 *
 * @pure true
 *
 * @example
 * ```ts
 * classifyInclude({ line: 1, path: "vector", quoted: false }, "a.cc", ["h"], catalog);
 * // "cpp_system"
 * ```
 */
export function classifyInclude(
	include: IncludeDirective,
	filePath: string,
	headerExtensions: readonly string[],
	catalog: HeaderCatalog,
): IncludeGroup {
	if (include.quoted) {
		const ownHeader =
			headerExtensions.includes(extensionOf(include.path)) &&
			!headerExtensions.includes(extensionOf(filePath)) &&
			stem(include.path) === stem(filePath);
		return ownHeader ? "own" : "project";
	}
	if (catalog.cpp.has(include.path)) return "cpp_system";
	if (catalog.c.has(include.path)) return "c_system";
	return "third_party";
}

/**
 * Sort key for alphabetical order inside a group.
 *
 * @pure true
 */
export const canonicalIncludePath = (path: string): string =>
	path.replace(/-inl\.h$/, ".h").replace(/-/g, "_").toLowerCase();

interface Section {
	rank: number;
	group: IncludeGroup | null;
	previous: { readonly include: IncludeDirective; readonly group: IncludeGroup } | null;
}

const freshSection = (): Section => ({ rank: -1, group: null, previous: null });

interface Occurrence {
	readonly line: number;
	readonly conditionals: readonly ConditionalFrame[];
}

/**
 * Whether two positions sit in different branches of the same `#if` group.
 *
 * @pure true
 */
export const exclusiveBranches = (
	a: readonly ConditionalFrame[],
	b: readonly ConditionalFrame[],
): boolean =>
	a.some((x) => b.some((y) => x.openedAt === y.openedAt && x.branch !== y.branch));

function checkIncludes(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];
	if (ctx.includes.length === 0) return findings;

	const catalog = headerCatalog();
	const byLine = new Map(ctx.includes.map((include) => [include.line, include]));
	const seen = new Map<string, readonly Occurrence[]>();
	let section = freshSection();

	for (const line of ctx.lines) {
		if (line.preprocessor && CONDITIONAL.test(line.text)) {
			section = freshSection();
			continue;
		}

		const include = byLine.get(line.lineNumber);
		if (include === undefined) continue;

		const conditionals = snapshotAt(ctx.nesting, include.line).conditionals;
		const earlier = seen.get(include.path) ?? [];
		const first = earlier.find((o) => !exclusiveBranches(o.conditionals, conditionals));
		if (first !== undefined) {
			findings.push(
				finding(
					include.line,
					"build/include",
					4,
					`"${include.path}" already included at ${ctx.source.path}:${first.line}`,
				),
			);
		} else {
			seen.set(include.path, [...earlier, { line: include.line, conditionals }]);
		}

		if (include.quoted && !include.path.includes("/")) {
			findings.push(
				finding(
					include.line,
					"build/include_subdir",
					4,
					"Include the directory when naming header files",
				),
			);
		}

		const group = classifyInclude(
			include,
			ctx.source.path,
			ctx.config.headerExtensions,
			catalog,
		);
		const rank = ctx.config.includeOrder.indexOf(group);

		if (section.group !== null && rank < section.rank) {
			findings.push(
				finding(
					include.line,
					"build/include_order",
					4,
					`Found ${groupLabel(group)} after ${groupLabel(section.group)}`,
				),
			);
		} else if (rank > section.rank) {
			section.rank = rank;
			section.group = group;
		} else if (
			section.previous !== null &&
			section.previous.group === group &&
			section.previous.include.line === include.line - 1 &&
			canonicalIncludePath(include.path) <
				canonicalIncludePath(section.previous.include.path)
		) {
			findings.push(
				finding(
					include.line,
					"build/include_alpha",
					4,
					`Include "${include.path}" not in alphabetical order`,
				),
			);
		}
		section.previous = { include, group };
	}

	return findings;
}

export const includeChecker: Checker = {
	id: "includes",
	categories: [
		"build/include",
		"build/include_alpha",
		"build/include_order",
		"build/include_subdir",
	],
	check: checkIncludes,
};
