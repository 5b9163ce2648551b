// CHANGE: Resolved configuration model handed to the core
// WHY: Filter rules and thresholds are explicit values, never global state
// PURITY: CORE
// INVARIANT: A LintConfig is only produced by resolveConfig and is always valid
// COMPLEXITY: O(1)

export const OUTPUT_FORMATS = [
	"emacs",
	"vs7",
	"eclipse",
	"junit",
	"sed",
	"gsed",
] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const COUNTING_MODES = ["total", "toplevel", "detailed"] as const;

export type CountingMode = (typeof COUNTING_MODES)[number];

export const INCLUDE_GROUPS = [
	"own",
	"c_system",
	"cpp_system",
	"project",
	"third_party",
] as const;

export type IncludeGroup = (typeof INCLUDE_GROUPS)[number];

/**
 * One `+prefix` / `-prefix` category filter.
 */
export interface FilterRule {
	readonly sign: "+" | "-";
	readonly prefix: string;
}

/**
 * Fully validated configuration for a run.
 *
 * @property filters Built-in defaults followed by user rules, in application order
 * @property minConfidence Findings below this confidence are not reported
 * @property failureConfidence A reported finding at or above this confidence marks the run as failed
 * @property concurrency Files analyzed at the same time
 */
export interface LintConfig {
	readonly lineLength: number;
	readonly filters: readonly FilterRule[];
	readonly counting: CountingMode;
	readonly output: OutputFormat;
	readonly minConfidence: number;
	readonly failureConfidence: number;
	readonly headerExtensions: readonly string[];
	readonly sourceExtensions: readonly string[];
	readonly includeOrder: readonly IncludeGroup[];
	readonly functionLengthThreshold: number;
	readonly concurrency: number;
}

/**
 * Unvalidated options as supplied by a caller (CLI, config file, API user).
 *
 * `filters` accepts either a comma-separated string or a list of entries.
 */
export interface LintOptions {
	readonly lineLength?: number;
	readonly filters?: string | readonly string[];
	readonly counting?: string;
	readonly output?: string;
	readonly minConfidence?: number;
	readonly failureConfidence?: number;
	readonly headerExtensions?: readonly string[];
	readonly sourceExtensions?: readonly string[];
	readonly includeOrder?: readonly string[];
	readonly functionLengthThreshold?: number;
	readonly concurrency?: number;
}
