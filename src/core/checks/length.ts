// CHANGE: Physical line format checks (length, tabs, trailing space, final newline, encoding)
// WHY: These rules look at raw bytes of a line and need no structure
// PURITY: CORE
// INVARIANT: One finding per rule per line at most
// COMPLEXITY: O(n) over the characters of the file

import { displayWidth } from "../text/column.js";
import { type Finding, finding } from "../types/index.js";
import type { Checker, FileContext } from "./types.js";

const INCLUDE_LINE = /^\s*#\s*include\b/;
const URL_COMMENT = /^\s*\/\/.*https?:\/\/\S*$/;
const TRAILING_SPACE = /[ \t]$/;
const REPLACEMENT_CHARACTER = "\uFFFD";

/**
 * Lines exempt from the length limit.
 *
 * @pure true
 */
export const isLengthExempt = (raw: string): boolean =>
	INCLUDE_LINE.test(raw) || URL_COMMENT.test(raw);

function checkLines(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];
	const limit = ctx.config.lineLength;

	for (const line of ctx.lines) {
		const { raw, lineNumber } = line;

		if (raw.includes(REPLACEMENT_CHARACTER)) {
			findings.push(
				finding(
					lineNumber,
					"readability/utf8",
					5,
					"Line contains invalid UTF-8 (or Unicode replacement character).",
				),
			);
		}
		if (raw.includes("\t")) {
			findings.push(
				finding(lineNumber, "whitespace/tab", 1, "Tab found; better to use spaces"),
			);
		}
		if (TRAILING_SPACE.test(raw)) {
			findings.push(
				finding(
					lineNumber,
					"whitespace/end_of_line",
					4,
					"Line ends in whitespace.  Consider deleting these extra spaces.",
				),
			);
		}
		if (displayWidth(raw) > limit && !isLengthExempt(raw)) {
			findings.push(
				finding(
					lineNumber,
					"whitespace/line_length",
					5,
					`Lines should be <= ${limit} characters long`,
				),
			);
		}
	}

	const last = ctx.lines[ctx.lines.length - 1];
	if (last !== undefined && !ctx.source.endsWithNewline) {
		findings.push(
			finding(
				last.lineNumber,
				"whitespace/ending_newline",
				5,
				"Could not find a newline character at the end of the file.",
			),
		);
	}

	return findings;
}

export const lineFormatChecker: Checker = {
	id: "line-format",
	categories: [
		"readability/utf8",
		"whitespace/end_of_line",
		"whitespace/ending_newline",
		"whitespace/line_length",
		"whitespace/tab",
	],
	check: checkLines,
};
