// CHANGE: Typed domain error ADT for the Functional Core using Effect.Data
// WHY: Configuration and per-file failures are values in the Effect error channel, not thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A category filter entry that does not start with `+` or `-`.
 *
 * @pure true (Data class)
 * @invariant entry.length ≥ 0
 */
export class InvalidFilter extends Data.TaggedError("InvalidFilter")<{
	readonly entry: string;
}> {}

/**
 * A filter names a category prefix that no check can emit.
 *
 * @pure true (Data class)
 * @invariant category.length > 0
 */
export class UnknownCategory extends Data.TaggedError("UnknownCategory")<{
	readonly category: string;
}> {}

/**
 * Output format selector outside the supported set.
 *
 * @pure true (Data class)
 */
export class UnknownOutputFormat extends Data.TaggedError(
	"UnknownOutputFormat",
)<{
	readonly format: string;
	readonly supported: readonly string[];
}> {}

/**
 * Any other option with an out-of-range or malformed value.
 *
 * @pure true (Data class)
 * @invariant option.length > 0 ∧ detail.length > 0
 */
export class InvalidOption extends Data.TaggedError("InvalidOption")<{
	readonly option: string;
	readonly detail: string;
}> {}

/**
 * A single file's pass could not complete (undecodable bytes, internal fault).
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FileProcessingError extends Data.TaggedError(
	"FileProcessingError",
)<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Union of configuration failures surfaced before any file is processed.
 */
export type ConfigError =
	| InvalidFilter
	| UnknownCategory
	| UnknownOutputFormat
	| InvalidOption;

/**
 * Union type of all application errors for Effect signatures
 */
export type LintError = ConfigError | FileProcessingError;
