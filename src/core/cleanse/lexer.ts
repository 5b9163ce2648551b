// CHANGE: Comment and literal neutralizing lexer
// WHY: Structural heuristics must never be confused by braces, quotes or keywords inside comments and strings
// PURITY: CORE
// INVARIANT: ∀ line: lexed.text.length === raw.length (column math survives cleansing)
// INVARIANT: a line without comments or literals is returned unchanged
// COMPLEXITY: O(n) over the total number of characters

import { type CommentSegment, type Finding, finding } from "../types/index.js";

/**
 * Replacement for every character inside a string or character literal.
 */
export const PLACEHOLDER = "_";

type LexState =
	| { readonly mode: "code" }
	| { readonly mode: "block-comment"; readonly startLine: number }
	| {
			readonly mode: "raw-string";
			readonly terminator: string;
			readonly startLine: number;
	  }
	| { readonly mode: "literal"; readonly quote: '"' | "'" };

const CODE: LexState = { mode: "code" };

const RAW_STRING_OPEN = /^(?:u8|u|U|L)?R"([^\s()\\]{0,16})\(/;
const DIAGNOSTIC_DIRECTIVE = /^\s*#\s*(?:error|warning)\b/;

export interface LexedLine {
	readonly text: string;
	readonly comments: readonly CommentSegment[];
}

export interface LexResult {
	readonly lines: readonly LexedLine[];
	readonly anomalies: readonly Finding[];
}

const blank = (count: number): string => " ".repeat(Math.max(0, count));
const fill = (count: number): string => PLACEHOLDER.repeat(Math.max(0, count));

const isWordChar = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);

/**
 * `'` inside a numeric literal such as `1'000'000` or `0xFF'FF`.
 *
 * @pure true
 */
function isDigitSeparator(raw: string, index: number): boolean {
	const hex = /[0-9A-Fa-f]/;
	if (!hex.test(raw.charAt(index - 1)) || !hex.test(raw.charAt(index + 1))) {
		return false;
	}
	let start = index - 1;
	while (start > 0 && /[0-9A-Za-z_'.]/.test(raw.charAt(start - 1))) {
		start -= 1;
	}
	return /[0-9]/.test(raw.charAt(start));
}

/**
 * Raw string opener (`R"delim(`) starting exactly at `index`, if any.
 */
function rawStringOpenAt(
	raw: string,
	index: number,
): { readonly opener: string; readonly delimiter: string } | null {
	if (index > 0 && isWordChar(raw.charAt(index - 1))) return null;
	const match = RAW_STRING_OPEN.exec(raw.slice(index));
	if (match === null) return null;
	return { opener: match[0], delimiter: match[1] ?? "" };
}

interface LineOutcome {
	readonly text: string;
	readonly comments: readonly CommentSegment[];
	readonly state: LexState;
}

/**
 * Lex one physical line starting from the state left by the previous line.
 *
 * @pure true (anomalies are appended to the caller-owned array)
 */
function lexLine(
	raw: string,
	lineNumber: number,
	initial: LexState,
	anomalies: Finding[],
): LineOutcome {
	const out: string[] = [];
	const comments: CommentSegment[] = [];
	let state = initial;
	let i = 0;
	// a literal may only run on past a backslash that ends the line
	let spliced = false;

	if (state.mode === "code" && DIAGNOSTIC_DIRECTIVE.test(raw)) {
		// free text; apostrophes there are not literals
		return { text: raw, comments, state };
	}

	while (i < raw.length) {
		if (state.mode === "block-comment") {
			const end = raw.indexOf("*/", i);
			const stop = end === -1 ? raw.length : end;
			comments.push({ column: i, style: "block", text: raw.slice(i, stop) });
			out.push(blank((end === -1 ? raw.length : end + 2) - i));
			if (end === -1) {
				i = raw.length;
			} else {
				i = end + 2;
				state = CODE;
			}
			continue;
		}

		if (state.mode === "raw-string") {
			const end = raw.indexOf(state.terminator, i);
			if (end === -1) {
				out.push(fill(raw.length - i));
				i = raw.length;
			} else {
				out.push(fill(end + state.terminator.length - 1 - i), '"');
				i = end + state.terminator.length;
				state = CODE;
			}
			continue;
		}

		if (state.mode === "literal") {
			const ch = raw.charAt(i);
			if (ch === "\\") {
				if (i === raw.length - 1) {
					out.push("\\");
					spliced = true;
					i += 1;
				} else {
					out.push(fill(2));
					i += 2;
				}
			} else if (ch === state.quote) {
				out.push(ch);
				i += 1;
				state = CODE;
			} else {
				out.push(PLACEHOLDER);
				i += 1;
			}
			continue;
		}

		const ch = raw.charAt(i);
		const next = raw.charAt(i + 1);

		if (ch === "/" && next === "/") {
			comments.push({ column: i, style: "line", text: raw.slice(i + 2) });
			out.push(blank(raw.length - i));
			i = raw.length;
			continue;
		}

		if (ch === "/" && next === "*") {
			const end = raw.indexOf("*/", i + 2);
			const stop = end === -1 ? raw.length : end;
			comments.push({
				column: i,
				style: "block",
				text: raw.slice(i + 2, stop),
			});
			if (end === -1) {
				out.push(blank(raw.length - i));
				state = { mode: "block-comment", startLine: lineNumber };
				i = raw.length;
			} else {
				out.push(blank(end + 2 - i));
				i = end + 2;
			}
			continue;
		}

		const rawOpen = rawStringOpenAt(raw, i);
		if (rawOpen !== null) {
			const quoteAt = rawOpen.opener.indexOf('"');
			// keep the prefix and opening quote, blank out `delim(`
			out.push(
				rawOpen.opener.slice(0, quoteAt + 1),
				fill(rawOpen.opener.length - quoteAt - 1),
			);
			i += rawOpen.opener.length;
			state = {
				mode: "raw-string",
				terminator: `)${rawOpen.delimiter}"`,
				startLine: lineNumber,
			};
			continue;
		}

		if (ch === '"' || (ch === "'" && !isDigitSeparator(raw, i))) {
			out.push(ch);
			i += 1;
			state = { mode: "literal", quote: ch };
			continue;
		}

		out.push(ch);
		i += 1;
	}

	if (state.mode === "literal" && !spliced) {
		anomalies.push(
			finding(
				lineNumber,
				"readability/multiline_string",
				5,
				state.quote === '"'
					? 'Multi-line string ("...") found.  Use a raw string or string concatenation instead.'
					: "Unterminated character literal.",
			),
		);
		state = CODE;
	}

	return { text: out.join(""), comments, state };
}

/**
 * Lex every physical line of a file.
 *
 * Block comments and raw strings may span lines; lines inside them come out
 * blank (comments) or filled with placeholders (raw strings) so that every
 * physical line keeps its slot. An unterminated block comment or raw string
 * is reported once, at the line where it starts.
 *
 * @pure true
 * @invariant result.lines.length === rawLines.length
 * @complexity O(total characters)
 */
export function lexLines(rawLines: readonly string[]): LexResult {
	const anomalies: Finding[] = [];
	const lines: LexedLine[] = [];
	let state: LexState = CODE;

	rawLines.forEach((raw, index) => {
		const outcome = lexLine(raw, index + 1, state, anomalies);
		lines.push({ text: outcome.text, comments: outcome.comments });
		state = outcome.state;
	});

	if (state.mode === "block-comment") {
		anomalies.push(
			finding(
				state.startLine,
				"readability/multiline_comment",
				5,
				"Could not find end of multi-line comment",
			),
		);
	} else if (state.mode === "raw-string") {
		anomalies.push(
			finding(
				state.startLine,
				"readability/multiline_string",
				5,
				"Could not find end of raw string literal",
			),
		);
	}

	return { lines, anomalies };
}
