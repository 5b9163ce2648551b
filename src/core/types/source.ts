// CHANGE: Source and cleansed-line domain models
// WHY: Every later stage (nesting, checks, filters) reads the same immutable line model
// PURITY: CORE
// INVARIANT: lines.length of a CleansedSource equals lines.length of its SourceFile
// COMPLEXITY: O(1)

/**
 * Header vs implementation file, decided by extension policy or a caller hint.
 */
export type FileKind = "header" | "source";

/**
 * One input file for a single linting pass.
 *
 * @property lines Physical lines without their terminators (trailing `\r` removed)
 * @property endsWithNewline Whether the raw text ended with a line terminator
 */
export interface SourceFile {
	readonly path: string;
	readonly lines: readonly string[];
	readonly endsWithNewline: boolean;
	readonly kind: FileKind;
}

/**
 * A piece of comment text found on one physical line.
 *
 * @property column 0-based column of the comment opener (or 0 for a continued block comment)
 * @property text Comment body without the `//`, `/*` or `*\/` delimiters
 */
export interface CommentSegment {
	readonly column: number;
	readonly style: "line" | "block";
	readonly text: string;
}

export type SuppressionScope = "line" | "next-line";

/**
 * In-source suppression marker (`NOLINT`, `NOLINTNEXTLINE`).
 *
 * @invariant categories === "all" or a non-empty list of category prefixes
 */
export interface SuppressionMarker {
	readonly scope: SuppressionScope;
	readonly categories: "all" | readonly string[];
}

/**
 * A physical line after comments and literal contents have been neutralized.
 *
 * @invariant text.length === raw.length
 * @invariant joined === (logicalStart !== lineNumber)
 */
export interface CleansedLine {
	readonly lineNumber: number;
	readonly raw: string;
	readonly text: string;
	readonly joined: boolean;
	readonly logicalStart: number;
	readonly preprocessor: boolean;
	readonly comments: readonly CommentSegment[];
	readonly marker: SuppressionMarker | null;
}

/**
 * A statement reassembled from one or more physical lines.
 */
export interface LogicalLine {
	readonly start: number;
	readonly end: number;
	readonly text: string;
}
