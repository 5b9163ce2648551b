// CHANGE: Column and display-width helpers for line measurements
// WHY: Line-length and indentation checks measure what an editor shows, not UTF-16 units
// PURITY: CORE
// INVARIANT: displayWidth(s) ≥ number of code points in s without tabs
// COMPLEXITY: O(n) per line

/**
 * Default tab stop width.
 */
export const TAB_WIDTH = 8;

/**
 * Code point ranges rendered two columns wide (East Asian Wide/Fullwidth, emoji).
 */
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0x1100, 0x115f],
	[0x2e80, 0x303e],
	[0x3041, 0x33ff],
	[0x3400, 0x4dbf],
	[0x4e00, 0x9fff],
	[0xa000, 0xa4cf],
	[0xac00, 0xd7a3],
	[0xf900, 0xfaff],
	[0xfe30, 0xfe4f],
	[0xff00, 0xff60],
	[0xffe0, 0xffe6],
	[0x1f300, 0x1f64f],
	[0x1f900, 0x1f9ff],
	[0x20000, 0x3fffd],
];

/**
 * Columns occupied by one code point (tabs excluded).
 *
 * @pure true
 * @invariant result ∈ {0, 1, 2}
 */
export function codePointWidth(codePoint: number): number {
	// combining diacritical marks
	if (codePoint >= 0x0300 && codePoint <= 0x036f) return 0;
	for (const [lo, hi] of WIDE_RANGES) {
		if (codePoint >= lo && codePoint <= hi) return 2;
	}
	return 1;
}

/**
 * Width of a line as displayed, with tabs advanced to the next tab stop.
 *
 * @pure true
 * @complexity O(n) where n = |content|
 *
 * @example
 * ```ts
 * displayWidth("x\ty"); // 9
 * displayWidth("日本"); // 4
 * ```
 */
export function displayWidth(content: string, tabWidth = TAB_WIDTH): number {
	let column = 0;
	for (const ch of content) {
		if (ch === "\t") {
			column += tabWidth - (column % tabWidth);
		} else {
			column += codePointWidth(ch.codePointAt(0) ?? 0);
		}
	}
	return column;
}

/**
 * Number of leading space characters (a tab stops the count).
 *
 * @pure true
 */
export function leadingSpaces(content: string): number {
	let count = 0;
	while (count < content.length && content.charAt(count) === " ") {
		count += 1;
	}
	return count;
}

/**
 * True when the line holds nothing but whitespace.
 *
 * @pure true
 */
export const isBlank = (content: string): boolean => content.trim() === "";
