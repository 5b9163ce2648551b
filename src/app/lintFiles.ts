// CHANGE: Application layer orchestration (APP) between the pure core and the shell
// WHY: Resolves configuration, fans files out under bounded concurrency and replays results in input order
// PURITY: APP (no console, no process.exit)
// EFFECT: Effect<LintReport, ConfigError>
// INVARIANT: Report order follows input order, never completion order
// INVARIANT: A failing file becomes a failed FileResult; the batch always continues
// COMPLEXITY: O(Σ file sizes)

import { Effect, pipe } from "effect";

import { UNPROCESSABLE_CATEGORY } from "../core/checks/index.js";
import { resolveConfig } from "../core/config/index.js";
import { type ConfigError, FileProcessingError } from "../core/errors.js";
import { lintText } from "../core/lint-file.js";
import { buildReport, type FileResult, type LintReport } from "../core/report/index.js";
import type { FileKind, LintConfig, LintOptions } from "../core/types/index.js";

/**
 * One file handed in by the caller.
 *
 * @property content Text, or raw bytes that must decode as UTF-8
 * @property kind Overrides the extension-based header/source decision
 */
export interface LintInput {
	readonly path: string;
	readonly content: string | Uint8Array;
	readonly kind?: FileKind;
}

/**
 * Per-file analysis step; injectable so callers can wrap it (timing, tracing).
 */
export type FileAnalyzer = (
	input: LintInput,
	config: LintConfig,
) => Effect.Effect<FileResult>;

/**
 * Bytes must be valid UTF-8; anything else fails the file as unprocessable.
 * Text handed in already decoded may still carry U+FFFD from a lenient
 * decoder upstream, and `readability/utf8` reports those lines.
 */
const decode = (content: string | Uint8Array): string =>
	typeof content === "string"
		? content
		: new TextDecoder("utf-8", { fatal: true }).decode(content);

const describe = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Result recorded for a file whose pass was abandoned.
 *
 * @pure true
 */
export const failedResult = (error: FileProcessingError): FileResult => ({
	path: error.path,
	diagnostics: [
		{
			file: error.path,
			line: 1,
			category: UNPROCESSABLE_CATEGORY,
			confidence: 5,
			message: `File could not be processed: ${error.detail}`,
		},
	],
	failure: error.detail,
});

/**
 * Lint one input; never fails.
 *
 * @effect Effect<FileResult, never>
 */
export const lintFile: FileAnalyzer = (input, config) =>
	pipe(
		Effect.try({
			try: () => lintText(input.path, decode(input.content), config, input.kind),
			catch: (error) =>
				new FileProcessingError({ path: input.path, detail: describe(error) }),
		}),
		Effect.map(
			(diagnostics): FileResult => ({ path: input.path, diagnostics, failure: null }),
		),
		Effect.catchTag("FileProcessingError", (error) =>
			Effect.succeed(failedResult(error)),
		),
	);

/**
 * Lint a batch with an already resolved configuration.
 *
 * @effect Effect<LintReport, never>
 * @invariant report.files[i].path === inputs[i].path
 */
export const lintFiles = (
	inputs: readonly LintInput[],
	config: LintConfig,
	analyze: FileAnalyzer = lintFile,
): Effect.Effect<LintReport> =>
	pipe(
		Effect.forEach(inputs, (input) => analyze(input, config), {
			concurrency: config.concurrency,
		}),
		Effect.map((files) => buildReport(files, config)),
	);

/**
 * Resolve options, then lint the batch.
 *
 * @effect Effect<LintReport, ConfigError>
 *
 * @example
 * ```ts
 * const report = await Effect.runPromise(
 *   runLint([{ path: "a.cc", content: "int main() {}\n" }], { filters: "-legal" }),
 * );
 * ```
 */
export const runLint = (
	inputs: readonly LintInput[],
	options: LintOptions = {},
): Effect.Effect<LintReport, ConfigError> =>
	pipe(
		resolveConfig(options),
		Effect.flatMap((config) => lintFiles(inputs, config)),
	);
