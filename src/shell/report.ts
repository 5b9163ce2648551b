// CHANGE: Console output for a run
// WHY: Only the shell writes to stdout/stderr; the core hands back strings
// PURITY: SHELL (console I/O)
// INVARIANT: The report goes to stdout, progress and summary to stderr
// COMPLEXITY: O(|report|)

import { match } from "ts-pattern";

import type { ConfigError } from "../core/errors.js";
import type { LintReport } from "../core/report/index.js";

/**
 * One-line description of a configuration error.
 *
 * @pure true
 *
 * @example
 * ```ts
 * describeConfigError(new InvalidFilter({ entry: "whitespace" }));
 * // "Every filter in --filter must start with + or - (whitespace)"
 * ```
 */
export const describeConfigError = (error: ConfigError): string =>
	match(error)
		.with(
			{ _tag: "InvalidFilter" },
			(e) => `Every filter in --filter must start with + or - (${e.entry})`,
		)
		.with(
			{ _tag: "UnknownCategory" },
			(e) => `Filter names an unknown category: ${e.category}`,
		)
		.with(
			{ _tag: "UnknownOutputFormat" },
			(e) => `The only allowed output formats are ${e.supported.join(", ")} (got ${e.format})`,
		)
		.with({ _tag: "InvalidOption" }, (e) => `Invalid value for ${e.option}: ${e.detail}`)
		.exhaustive();

/**
 * Write the report, per-file progress and the summary.
 *
 * @pure false (console I/O)
 */
export function printReport(report: LintReport, quiet: boolean): void {
	if (report.output.length > 0) process.stdout.write(report.output);
	if (!quiet) {
		for (const file of report.files) {
			console.error(`Done processing ${file.path}`);
		}
	}
	if (!quiet || report.tally.total > 0) process.stderr.write(report.summary);
}

/**
 * Write notices for paths that were not linted.
 *
 * @pure false (console I/O)
 */
export function printNotices(notices: readonly string[]): void {
	for (const notice of notices) console.error(notice);
}
