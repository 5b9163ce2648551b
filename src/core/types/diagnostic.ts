// CHANGE: Diagnostic model shared by checks, filters and reporters
// WHY: A single immutable record flows from a check to the report
// PURITY: CORE
// INVARIANT: confidence ∈ [0, 5], line ≥ 1
// COMPLEXITY: O(1)

/**
 * Highest confidence a check can assign.
 */
export const MAX_CONFIDENCE = 5;

/**
 * What a check reports about one line of the file it is looking at.
 *
 * @property category Dotted/slashed hierarchical name, e.g. `whitespace/braces`
 * @property confidence How sure the heuristic is, 0 (guess) to 5 (certain)
 */
export interface Finding {
	readonly line: number;
	readonly category: string;
	readonly confidence: number;
	readonly message: string;
}

/**
 * A finding bound to the file it belongs to.
 */
export interface Diagnostic extends Finding {
	readonly file: string;
}

export const finding = (
	line: number,
	category: string,
	confidence: number,
	message: string,
): Finding => ({ line, category, confidence, message });
