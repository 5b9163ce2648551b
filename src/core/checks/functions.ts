// CHANGE: Function body length check
// WHY: Long bodies are reported with a confidence that grows with how far past the limit they run
// PURITY: CORE
// INVARIANT: confidence = min(5, floor(log2(lines / threshold))) and is never below minConfidence
// COMPLEXITY: O(n) over function bodies

import { isBlank } from "../text/column.js";
import { type Finding, finding, MAX_CONFIDENCE } from "../types/index.js";
import type { Checker, FileContext } from "./types.js";

/**
 * Body lines that are neither blank nor comment-only, between the braces.
 *
 * @pure true
 */
export function countBodyLines(
	ctx: FileContext,
	bodyAt: number,
	closedAt: number,
): number {
	let count = 0;
	for (let n = bodyAt + 1; n < closedAt; n += 1) {
		const line = ctx.lines[n - 1];
		if (line !== undefined && !isBlank(line.text)) count += 1;
	}
	return count;
}

function checkFunctionLengths(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];
	const threshold = ctx.config.functionLengthThreshold;
	// the trigger doubles per requested confidence level
	const trigger = threshold * 2 ** ctx.config.minConfidence;

	for (const { frame, closedAt } of ctx.nesting.records) {
		if (frame.kind !== "function" || closedAt === null || frame.bodyAt === null) continue;
		const lines = countBodyLines(ctx, frame.bodyAt, closedAt);
		if (lines <= trigger) continue;
		findings.push(
			finding(
				closedAt,
				"readability/fn_size",
				Math.min(MAX_CONFIDENCE, Math.floor(Math.log2(lines / threshold))),
				`Small and focused functions are preferred: ${frame.name ?? "operator"}() has ${lines} non-comment lines (error triggered by exceeding ${trigger} lines).`,
			),
		);
	}
	return findings;
}

export const functionLengthChecker: Checker = {
	id: "function-length",
	categories: ["readability/fn_size"],
	check: checkFunctionLengths,
};
