// CHANGE: Suspicious arithmetic inside loop conditions
// WHY: An arithmetic or shift operator in the condition of a for/while usually means a typo'd comparison
// PURITY: CORE
// INVARIANT: Findings are reported at the line holding the condition's closing parenthesis
// COMPLEXITY: O(k) per loop header

import { type Finding, finding } from "../types/index.js";
import { closeExpression, expressionText } from "./expression.js";
import type { Checker } from "./types.js";

const LOOP_HEAD = /^\s*(for|while)\s*\(/;
const SUSPICIOUS_OPERATORS = ["+", "-", "*", "/", "%", "<<", ">>"] as const;

/**
 * Whether a condition contains an arithmetic or shift operator.
 * Member access (`->`) is blanked first, so `while (node->next)` is not
 * read as a subtraction; a bare `-` still counts.
 *
 * @pure true
 */
export const hasSuspiciousOperator = (condition: string): boolean => {
	const stripped = condition.replace(/->/g, " ");
	return SUSPICIOUS_OPERATORS.some((operator) => stripped.includes(operator));
};

/**
 * The `for` header's condition is its second `;`-separated segment.
 *
 * @pure true
 */
export const forCondition = (header: string): string | null =>
	header.split(";")[1] ?? null;

export const loopConditionChecker: Checker = {
	id: "loop-conditions",
	categories: ["runtime/for_loop_condition", "runtime/while_loop_condition"],
	check: (ctx) => {
		const findings: Finding[] = [];
		const texts = ctx.lines.map((line) => line.text);

		ctx.lines.forEach((line, index) => {
			const head = LOOP_HEAD.exec(line.text);
			if (head === null) return;
			const open = line.text.indexOf("(");
			const end = closeExpression(texts, index, open);
			if (end === null) return;
			const inner = expressionText(texts, index, open, end);

			if (head[1] === "for") {
				const condition = forCondition(inner);
				if (condition !== null && hasSuspiciousOperator(condition)) {
					findings.push(
						finding(
							end.index + 1,
							"runtime/for_loop_condition",
							5,
							"Possible incorrect condition in range-based for loop",
						),
					);
				}
			} else if (hasSuspiciousOperator(inner)) {
				findings.push(
					finding(
						end.index + 1,
						"runtime/while_loop_condition",
						5,
						"Possible incorrect condition in range-based while loop",
					),
				);
			}
		});

		return findings;
	},
};
