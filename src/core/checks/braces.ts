// CHANGE: Brace placement and control-statement spacing checks
// WHY: Brace position rules need the previous non-blank line and the closing record of each scope
// PURITY: CORE
// INVARIANT: Directive lines never take part in brace placement
// COMPLEXITY: O(n) plus one bracket match per `else if`

import { isBlank } from "../text/column.js";
import { type CleansedLine, type Finding, finding } from "../types/index.js";
import { closeExpression } from "./expression.js";
import type { Checker, FileContext } from "./types.js";

const LONE_OPEN_BRACE = /^\s*\{\s*$/;
const BRACE_MAY_FOLLOW = /[,;:}{(]\s*$/;
const ELSE_AT_START = /^\s*else\b/;
const ELSE_IF = /else if\s*\(/;
const CLOSE_ELSE_IF = /\}\s*else if\s*\(/;
const DANGLING_ELSE = /\}\s*else[^{]*$/;
const ELSE_OPEN = /^[^}]*else\s*\{/;
const NO_SPACE_BEFORE_BRACE =
	/(?:\)|\b(?:else|do|try|const|override|final|noexcept))\{/;
const CONTROL_PAREN = /\b(if|for|while|switch)\(/;
const SEMICOLON_AFTER_BODY = /\}\s*;\s*$/;

function previousCode(
	lines: readonly CleansedLine[],
	index: number,
): CleansedLine | undefined {
	for (let i = index - 1; i >= 0; i -= 1) {
		const line = lines[i];
		if (line !== undefined && !isBlank(line.text)) return line;
	}
	return undefined;
}

function checkElse(
	texts: readonly string[],
	index: number,
	line: CleansedLine,
): Finding[] {
	const text = line.text;
	const mismatch = finding(
		line.lineNumber,
		"readability/braces",
		5,
		"If an else has a brace on one side, it should have it on both",
	);

	if (ELSE_IF.test(text)) {
		const onLeft = CLOSE_ELSE_IF.test(text);
		const paren = text.indexOf("(", text.indexOf("else if"));
		const end = paren > 0 ? closeExpression(texts, index, paren) : null;
		if (end === null) return [];
		const onRight = (texts[end.index] ?? "").slice(end.column).includes("{");
		return onLeft === onRight ? [] : [mismatch];
	}
	return DANGLING_ELSE.test(text) || ELSE_OPEN.test(text) ? [mismatch] : [];
}

function checkBraces(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];
	const texts = ctx.lines.map((line) => line.text);

	ctx.lines.forEach((line, index) => {
		if (line.preprocessor) return;
		const text = line.text;
		const prev = previousCode(ctx.lines, index);

		if (
			LONE_OPEN_BRACE.test(text) &&
			prev !== undefined &&
			!prev.preprocessor &&
			!BRACE_MAY_FOLLOW.test(prev.text)
		) {
			findings.push(
				finding(
					line.lineNumber,
					"whitespace/braces",
					4,
					"{ should almost always be at the end of the previous line",
				),
			);
		}

		if (ELSE_AT_START.test(text) && prev !== undefined && /\}\s*$/.test(prev.text)) {
			findings.push(
				finding(
					line.lineNumber,
					"whitespace/newline",
					4,
					"An else should appear on the same line as the preceding }",
				),
			);
		}

		if (/\belse\b/.test(text)) findings.push(...checkElse(texts, index, line));

		if (NO_SPACE_BEFORE_BRACE.test(text)) {
			findings.push(
				finding(line.lineNumber, "whitespace/braces", 5, "Missing space before {"),
			);
		}

		const control = CONTROL_PAREN.exec(text);
		if (control !== null) {
			findings.push(
				finding(
					line.lineNumber,
					"whitespace/parens",
					5,
					`Missing space before ( in ${control[1] ?? ""}(`,
				),
			);
		}
	});

	for (const record of ctx.nesting.records) {
		const kind = record.frame.kind;
		if (record.closedAt === null || (kind !== "function" && kind !== "namespace")) {
			continue;
		}
		const closing = ctx.lines[record.closedAt - 1];
		if (closing !== undefined && SEMICOLON_AFTER_BODY.test(closing.text)) {
			findings.push(
				finding(record.closedAt, "readability/braces", 4, "You don't need a ; after a }"),
			);
		}
	}

	return findings;
}

export const braceChecker: Checker = {
	id: "braces",
	categories: [
		"readability/braces",
		"whitespace/braces",
		"whitespace/newline",
		"whitespace/parens",
	],
	check: checkBraces,
};
