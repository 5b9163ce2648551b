// CHANGE: Parse NOLINT / NOLINTNEXTLINE markers out of comment text
// WHY: Markers live in comments, which cleansing removes; they are read from the comment segments the lexer keeps
// PURITY: CORE
// INVARIANT: At most one marker per line; the first one found wins
// COMPLEXITY: O(k) where k = total comment length on the line

import type { CommentSegment, SuppressionMarker } from "../types/index.js";

const MARKER = /\bNOLINT(NEXTLINE)?\b(?:\(([^)]*)\))?/;

/**
 * Category list inside `NOLINT(...)`; `*` or an empty list means all.
 *
 * @pure true
 */
function parseCategoryList(list: string | undefined): "all" | readonly string[] {
	if (list === undefined) return "all";
	const entries = list
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
	return entries.length === 0 || entries.includes("*") ? "all" : entries;
}

/**
 * Extract the suppression marker carried by a line's comments.
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseMarker([{ column: 10, style: "line", text: " NOLINT(whitespace/tab)" }]);
 * // { scope: "line", categories: ["whitespace/tab"] }
 * ```
 */
export function parseMarker(
	comments: readonly CommentSegment[],
): SuppressionMarker | null {
	for (const segment of comments) {
		const match = MARKER.exec(segment.text);
		if (match !== null) {
			return {
				scope: match[1] === undefined ? "line" : "next-line",
				categories: parseCategoryList(match[2]),
			};
		}
	}
	return null;
}
