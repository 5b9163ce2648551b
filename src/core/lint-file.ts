// CHANGE: Single-file pipeline: cleanse → nest → check → filter → order
// WHY: One synchronous pass per file with no shared state, so files can be processed in any order
// PURITY: CORE
// INVARIANT: Result is sorted by line; findings on the same line keep their emission order
// COMPLEXITY: O(n · c) where c = number of checkers

import {
	buildContext,
	CHECKERS,
	KNOWN_CATEGORIES,
	type Checker,
} from "./checks/index.js";
import { cleanseSource } from "./cleanse/index.js";
import {
	buildSuppressionIndex,
	type DiagnosticFilter,
	shouldEmit,
} from "./filter/index.js";
import { trackNesting } from "./nesting/index.js";
import { createSourceFile, detectFileKind } from "./source.js";
import type {
	Diagnostic,
	FileKind,
	Finding,
	LintConfig,
	SourceFile,
} from "./types/index.js";

/**
 * Run every checker over one file and return the findings that survive filtering.
 *
 * @pure true
 * @invariant ∀ i < j: result[i].line ≤ result[j].line
 *
 * @example
 * ```ts
 * const source = createSourceFile("a.cc", "int x;\t\n", "source");
 * lintSource(source, config).map((d) => d.category);
 * // ["whitespace/tab", "whitespace/end_of_line", "legal/copyright"]
 * ```
 */
export function lintSource(
	source: SourceFile,
	config: LintConfig,
	checkers: readonly Checker[] = CHECKERS,
): readonly Diagnostic[] {
	const cleansed = cleanseSource(source);
	const nesting = trackNesting(cleansed.lines);
	const context = buildContext(cleansed, nesting, config);
	const suppression = buildSuppressionIndex(cleansed.lines, KNOWN_CATEGORIES);

	const findings: Finding[] = [
		...cleansed.anomalies,
		...nesting.anomalies,
		...suppression.anomalies,
		...checkers.flatMap((checker) => checker.check(context)),
	];

	const filter: DiagnosticFilter = {
		rules: config.filters,
		minConfidence: config.minConfidence,
		suppressions: suppression.index,
	};

	return findings
		.filter((f) => shouldEmit(filter, f))
		.sort((a, b) => a.line - b.line)
		.map((f) => ({ ...f, file: source.path }));
}

/**
 * Lint already-decoded text.
 *
 * @pure true
 */
export const lintText = (
	path: string,
	text: string,
	config: LintConfig,
	kind?: FileKind,
): readonly Diagnostic[] =>
	lintSource(
		createSourceFile(path, text, detectFileKind(path, config.headerExtensions, kind)),
		config,
	);
