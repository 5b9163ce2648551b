// CHANGE: Read the files named on the command line
// WHY: The core only sees text; deciding which paths are C/C++ and reading them is shell work
// PURITY: SHELL (file system reads)
// EFFECT: Effect<InputBatch, never>
// INVARIANT: inputs keep the order of `paths`; a path lands in exactly one of inputs, skipped, unreadable
// COMPLEXITY: O(Σ file sizes)

import { promises as fs } from "node:fs";

import { Effect, pipe } from "effect";

import { extensionOf } from "../core/source.js";
import type { LintConfig } from "../core/types/index.js";
import type { LintInput } from "../app/lintFiles.js";

/**
 * Outcome of reading a list of paths.
 *
 * @property skipped Notices for paths whose extension is not a C/C++ one
 * @property unreadable Notices for paths that could not be opened
 */
export interface InputBatch {
	readonly inputs: readonly LintInput[];
	readonly skipped: readonly string[];
	readonly unreadable: readonly string[];
}

type ReadOutcome =
	| { readonly _tag: "Read"; readonly input: LintInput }
	| { readonly _tag: "Skipped"; readonly notice: string }
	| { readonly _tag: "Unreadable"; readonly notice: string };

/**
 * Whether a path carries one of the configured header or source extensions.
 *
 * @pure true
 */
export const hasCheckedExtension = (filePath: string, config: LintConfig): boolean => {
	const ext = extensionOf(filePath);
	return config.headerExtensions.includes(ext) || config.sourceExtensions.includes(ext);
};

const readOne = (filePath: string, config: LintConfig): Effect.Effect<ReadOutcome> => {
	if (!hasCheckedExtension(filePath, config)) {
		const exts = [...config.headerExtensions, ...config.sourceExtensions].join(", ");
		return Effect.succeed({
			_tag: "Skipped",
			notice: `Ignoring ${filePath}; not a valid file name (${exts})`,
		});
	}
	return pipe(
		Effect.tryPromise(() => fs.readFile(filePath)),
		Effect.map((bytes): ReadOutcome => ({
			_tag: "Read",
			input: { path: filePath, content: new Uint8Array(bytes) },
		})),
		Effect.orElseSucceed(
			(): ReadOutcome => ({
				_tag: "Unreadable",
				notice: `Skipping input '${filePath}': Can't open for reading`,
			}),
		),
	);
};

/**
 * Read every path, sorting them into inputs and notices.
 *
 * @effect Effect<InputBatch, never>
 */
export const readInputs = (
	paths: readonly string[],
	config: LintConfig,
): Effect.Effect<InputBatch> =>
	pipe(
		Effect.forEach(paths, (filePath) => readOne(filePath, config), {
			concurrency: config.concurrency,
		}),
		Effect.map((outcomes) => {
			const inputs: LintInput[] = [];
			const skipped: string[] = [];
			const unreadable: string[] = [];
			for (const outcome of outcomes) {
				if (outcome._tag === "Read") inputs.push(outcome.input);
				else if (outcome._tag === "Skipped") skipped.push(outcome.notice);
				else unreadable.push(outcome.notice);
			}
			return { inputs, skipped, unreadable };
		}),
	);
