// CHANGE: Operator, comma and semicolon spacing checks
// WHY: Spacing around punctuation is read on cleansed text so literal contents never trigger it
// PURITY: CORE
// COMPLEXITY: O(n) over the lines of the file

import { type Finding, finding } from "../types/index.js";
import type { Checker } from "./types.js";

const ASSIGN_LEFT = /[\w.]=/;
const ASSIGN_RIGHT = /=[\w.]/;
const CONTROL_HEAD = /\b(if|while|for) /;
const COMPOUND_OPERATOR = /(>=|<=|==|!=|&=|\^=|\|=|\+=|\*=|\/=|%=)/;
const OPERATOR_ASSIGN = /operator=/;
const COMPARISON = /[^<>=!\s](==|!=|<=|>=)[^<>=!\s,;)]/;
const OPERATOR_COMPARISON = /\boperator\s*(==|!=|<=|>=)/g;
const COMMA = /,[^,\s]/;
const OPERATOR_COMMA = /\boperator\s*,\s*\(/g;
const SEMICOLON = /;[^\s};\\)/]/;

/**
 * Spacing findings for one cleansed line; `raw` guards the comma rule
 * against commas that only appear inside literals.
 *
 * @pure true
 */
export function operatorSpacing(
	lineNumber: number,
	text: string,
	raw: string,
): readonly Finding[] {
	const findings: Finding[] = [];

	if (
		(ASSIGN_LEFT.test(text) || ASSIGN_RIGHT.test(text)) &&
		!CONTROL_HEAD.test(text) &&
		!COMPOUND_OPERATOR.test(text) &&
		!OPERATOR_ASSIGN.test(text)
	) {
		findings.push(finding(lineNumber, "whitespace/operators", 4, "Missing spaces around ="));
	}

	const comparison = COMPARISON.exec(text.replace(OPERATOR_COMPARISON, "operator"));
	if (comparison !== null) {
		findings.push(
			finding(
				lineNumber,
				"whitespace/operators",
				3,
				`Missing spaces around ${comparison[1] ?? ""}`,
			),
		);
	}

	if (COMMA.test(text.replace(OPERATOR_COMMA, "F(")) && COMMA.test(raw)) {
		findings.push(finding(lineNumber, "whitespace/comma", 3, "Missing space after ,"));
	}

	if (SEMICOLON.test(text)) {
		findings.push(
			finding(lineNumber, "whitespace/semicolon", 3, "Missing space after ;"),
		);
	}

	return findings;
}

export const operatorChecker: Checker = {
	id: "operators",
	categories: [
		"whitespace/comma",
		"whitespace/operators",
		"whitespace/semicolon",
	],
	check: (ctx) =>
		ctx.lines
			.filter((line) => !line.preprocessor)
			.flatMap((line) => operatorSpacing(line.lineNumber, line.text, line.raw)),
};
