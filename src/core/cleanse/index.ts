// CHANGE: Cleanser entry point: lexing, directive marking, logical-line joining, markers
// WHY: Produces the one line model every downstream stage consumes
// PURITY: CORE
// INVARIANT: cleanseSource(f).lines.length === f.lines.length (joins never drop line slots)
// COMPLEXITY: O(n) over the characters of the file

import type {
	CleansedLine,
	Finding,
	LogicalLine,
	SourceFile,
} from "../types/index.js";
import { lexLines } from "./lexer.js";
import { parseMarker } from "./markers.js";

export { PLACEHOLDER } from "./lexer.js";
export { parseMarker } from "./markers.js";

/**
 * Everything the cleanser derives from one file.
 */
export interface CleansedSource {
	readonly file: SourceFile;
	readonly lines: readonly CleansedLine[];
	readonly logical: readonly LogicalLine[];
	readonly anomalies: readonly Finding[];
}

const DIRECTIVE = /^\s*#/;

const endsWithBackslash = (text: string): boolean =>
	text.trimEnd().endsWith("\\");

/**
 * Net `(` minus `)` on a cleansed line.
 *
 * @pure true
 */
export function parenBalance(text: string): number {
	let balance = 0;
	for (const ch of text) {
		if (ch === "(") balance += 1;
		else if (ch === ")") balance -= 1;
	}
	return balance;
}

/**
 * Mark directive lines and their backslash continuations.
 *
 * @pure true
 */
function markDirectives(texts: readonly string[]): readonly boolean[] {
	let carry = false;
	return texts.map((text) => {
		const directive = carry || DIRECTIVE.test(text);
		carry = directive && endsWithBackslash(text);
		return directive;
	});
}

const stripContinuation = (text: string): string => {
	const trimmed = text.trimEnd();
	return trimmed.endsWith("\\") ? trimmed.slice(0, -1).trimEnd() : trimmed;
};

/**
 * Group physical lines into logical statements.
 *
 * A line continues into the next when it ends with a backslash, or when it
 * leaves parentheses open; directive lines only continue through a backslash
 * and a code line never absorbs a following directive.
 *
 * @pure true
 * @invariant logical lines cover [1, texts.length] without gaps or overlap
 */
export function joinLogicalLines(
	texts: readonly string[],
	directives: readonly boolean[],
): readonly LogicalLine[] {
	const logical: LogicalLine[] = [];
	let start = 0;

	while (start < texts.length) {
		let end = start;
		let balance = parenBalance(texts[start] ?? "");
		while (end + 1 < texts.length) {
			const text = texts[end] ?? "";
			const continued =
				endsWithBackslash(text) ||
				(directives[end] !== true &&
					directives[end + 1] !== true &&
					balance > 0);
			if (!continued) break;
			end += 1;
			balance += parenBalance(texts[end] ?? "");
		}

		const parts = texts
			.slice(start, end + 1)
			.map((text, offset) =>
				offset === 0 ? stripContinuation(text) : stripContinuation(text).trim(),
			)
			.filter((part, offset) => offset === 0 || part.length > 0);
		logical.push({ start: start + 1, end: end + 1, text: parts.join(" ") });
		start = end + 1;
	}

	return logical;
}

/**
 * Cleanse a whole file.
 *
 * @pure true
 * @complexity O(n)
 */
export function cleanseSource(file: SourceFile): CleansedSource {
	const lexed = lexLines(file.lines);
	const texts = lexed.lines.map((line) => line.text);
	const directives = markDirectives(texts);
	const logical = joinLogicalLines(texts, directives);

	const anchors: number[] = [];
	for (const statement of logical) {
		for (let n = statement.start; n <= statement.end; n += 1) {
			anchors.push(statement.start);
		}
	}

	const lines: CleansedLine[] = file.lines.map((raw, index) => {
		const lexedLine = lexed.lines[index];
		const comments = lexedLine?.comments ?? [];
		const logicalStart = anchors[index] ?? index + 1;
		return {
			lineNumber: index + 1,
			raw,
			text: lexedLine?.text ?? "",
			joined: logicalStart !== index + 1,
			logicalStart,
			preprocessor: directives[index] === true,
			comments,
			marker: parseMarker(comments),
		};
	});

	return { file, lines, logical, anomalies: lexed.anomalies };
}
