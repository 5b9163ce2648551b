// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effects or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Lint a batch of in-memory files.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runLint } from "cxxstyle";
 *
 * const report = await Effect.runPromise(
 *   runLint([{ path: "src/main.cc", content: "int main() {}\n" }], { lineLength: 100 }),
 * );
 * process.stdout.write(report.output);
 * ```
 */
export {
	type FileAnalyzer,
	failedResult,
	type LintInput,
	lintFile,
	lintFiles,
	runLint,
} from "./app/lintFiles.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (pure building blocks)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	CHECKERS,
	type Checker,
	type FileContext,
	KNOWN_CATEGORIES,
	STRUCTURAL_CATEGORIES,
	UNPROCESSABLE_CATEGORY,
} from "./core/checks/index.js";
export { type CleansedSource, cleanseSource } from "./core/cleanse/index.js";
export { DEFAULT_CONFIG, resolveConfig } from "./core/config/index.js";
export { computeExitCode, computeExitCodeEffect } from "./core/decision.js";
export {
	type ConfigError,
	FileProcessingError,
	InvalidFilter,
	InvalidOption,
	type LintError,
	UnknownCategory,
	UnknownOutputFormat,
} from "./core/errors.js";
export {
	DEFAULT_FILTERS,
	isCategoryEnabled,
	parseFilters,
} from "./core/filter/index.js";
export { lintSource, lintText } from "./core/lint-file.js";
export type { DecisionState, ExitCode } from "./core/models.js";
export { trackNesting } from "./core/nesting/index.js";
export {
	buildReport,
	type FileResult,
	formatDiagnostic,
	type LintReport,
	renderJUnit,
	renderSummary,
	type Tally,
} from "./core/report/index.js";
export { createSourceFile } from "./core/source.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CountingMode,
	Diagnostic,
	FileKind,
	FilterRule,
	Finding,
	LintConfig,
	LintOptions,
	NestingTrace,
	OutputFormat,
	SourceFile,
} from "./core/types/index.js";
