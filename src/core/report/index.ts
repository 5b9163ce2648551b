// CHANGE: Aggregate per-file results into the run report
// WHY: Files may finish in any order; the report replays them in input order
// PURITY: CORE
// INVARIANT: Diagnostics appear grouped by file in the order of `files`, ascending by line inside a file
// COMPLEXITY: O(total diagnostics + k log k) for k summary keys

import type { CountingMode, LintConfig } from "../types/index.js";
import { formatDiagnostic } from "./format.js";
import { renderJUnit } from "./junit.js";
import { EMPTY_TALLY, mergeTallies, type Tally, tallyDiagnostics } from "./tally.js";
import type { FileResult, LintReport } from "./types.js";

export { formatDiagnostic, SED_FIXUPS } from "./format.js";
export { escapeXml, renderJUnit } from "./junit.js";
export {
	countingKey,
	EMPTY_TALLY,
	mergeTallies,
	recordDiagnostic,
	type Tally,
	tallyDiagnostics,
} from "./tally.js";
export type { FileResult, LintReport } from "./types.js";

/**
 * Tally lines printed after a run.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderSummary({ total: 2, byCategory: { whitespace: 2 }, byFile: { "a.cc": 2 } }, "toplevel");
 * // "Category 'whitespace' errors found: 2\nTotal errors found: 2\n"
 * ```
 */
export function renderSummary(tally: Tally, mode: CountingMode): string {
	const lines =
		mode === "total"
			? []
			: Object.keys(tally.byCategory)
					.sort()
					.map((key) => `Category '${key}' errors found: ${tally.byCategory[key] ?? 0}`);
	lines.push(`Total errors found: ${tally.total}`);
	return `${lines.join("\n")}\n`;
}

/**
 * Whether the run failed.
 *
 * @pure true
 * @invariant files.some(f => f.failure !== null) ⇒ true
 */
export const hadError = (
	files: readonly FileResult[],
	failureConfidence: number,
): boolean =>
	files.some(
		(file) =>
			file.failure !== null ||
			file.diagnostics.some((d) => d.confidence >= failureConfidence),
	);

/**
 * Build the report for an ordered list of file results.
 *
 * @pure true
 */
export function buildReport(
	files: readonly FileResult[],
	config: LintConfig,
): LintReport {
	const tally = files
		.map((file) => tallyDiagnostics(file.diagnostics, config.counting))
		.reduce(mergeTallies, EMPTY_TALLY);

	const output =
		config.output === "junit"
			? renderJUnit(files)
			: files
					.flatMap((file) => file.diagnostics)
					.map((d) => `${formatDiagnostic(config.output, d)}\n`)
					.join("");

	return {
		output,
		summary: renderSummary(tally, config.counting),
		hadError: hadError(files, config.failureConfidence),
		tally,
		files,
	};
}
