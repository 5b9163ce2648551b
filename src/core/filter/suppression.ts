// CHANGE: Per-line suppression index built from NOLINT markers
// WHY: Markers are narrower than filters: they silence one line only
// PURITY: CORE
// INVARIANT: A NOLINTNEXTLINE marker on line K affects line K+1 and no other line
// COMPLEXITY: O(n) to build, O(p) per query where p = prefixes listed on the line

import {
	type CleansedLine,
	type Finding,
	finding,
} from "../types/index.js";

/**
 * Suppressed categories per 1-based line.
 */
export type SuppressionIndex = ReadonlyMap<number, "all" | readonly string[]>;

export interface SuppressionScan {
	readonly index: SuppressionIndex;
	readonly anomalies: readonly Finding[];
}

const merge = (
	current: "all" | readonly string[] | undefined,
	added: "all" | readonly string[],
): "all" | readonly string[] => {
	if (current === undefined) return added;
	if (current === "all" || added === "all") return "all";
	return [...new Set([...current, ...added])];
};

/**
 * Collect markers into a line → categories index.
 *
 * Category names that match no known category are dropped from the marker
 * and reported as `readability/nolint` on the marker's own line.
 *
 * @pure true
 * @complexity O(n)
 */
export function buildSuppressionIndex(
	lines: readonly CleansedLine[],
	known: readonly string[],
): SuppressionScan {
	const index = new Map<number, "all" | readonly string[]>();
	const anomalies: Finding[] = [];

	for (const line of lines) {
		const marker = line.marker;
		if (marker === null) continue;

		let categories: "all" | readonly string[] = marker.categories;
		if (categories !== "all") {
			const accepted: string[] = [];
			for (const name of categories) {
				if (known.some((category) => category.startsWith(name))) {
					accepted.push(name);
				} else {
					anomalies.push(
						finding(
							line.lineNumber,
							"readability/nolint",
							5,
							`Unknown NOLINT error category: ${name}`,
						),
					);
				}
			}
			if (accepted.length === 0) continue;
			categories = accepted;
		}

		const target = marker.scope === "line" ? line.lineNumber : line.lineNumber + 1;
		index.set(target, merge(index.get(target), categories));
	}

	return { index, anomalies };
}

/**
 * @pure true
 */
export function isSuppressed(
	index: SuppressionIndex,
	line: number,
	category: string,
): boolean {
	const entry = index.get(line);
	if (entry === undefined) return false;
	return entry === "all" || entry.some((prefix) => category.startsWith(prefix));
}
