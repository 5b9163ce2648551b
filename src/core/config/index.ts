// CHANGE: Resolve caller options into a validated LintConfig
// WHY: Configuration errors must surface before any file is processed
// PURITY: CORE
// EFFECT: Effect<LintConfig, ConfigError>
// INVARIANT: The result always carries DEFAULT_FILTERS ahead of user rules
// COMPLEXITY: O(f · c) where f = filter entries, c = known categories

import { Effect } from "effect";

import { KNOWN_CATEGORIES } from "../checks/index.js";
import {
	type ConfigError,
	InvalidOption,
	UnknownOutputFormat,
} from "../errors.js";
import { DEFAULT_FILTERS, parseFilters } from "../filter/index.js";
import {
	COUNTING_MODES,
	type CountingMode,
	INCLUDE_GROUPS,
	type IncludeGroup,
	type LintConfig,
	type LintOptions,
	MAX_CONFIDENCE,
	OUTPUT_FORMATS,
	type OutputFormat,
} from "../types/index.js";

export const DEFAULT_CONFIG: LintConfig = {
	lineLength: 80,
	filters: DEFAULT_FILTERS,
	counting: "total",
	output: "emacs",
	minConfidence: 1,
	failureConfidence: 1,
	headerExtensions: ["h", "hh", "hpp", "hxx", "h++", "cuh"],
	sourceExtensions: ["c", "cc", "cpp", "cxx", "c++", "cu"],
	includeOrder: INCLUDE_GROUPS,
	functionLengthThreshold: 250,
	concurrency: 4,
};

const isOutputFormat = (value: string): value is OutputFormat =>
	OUTPUT_FORMATS.some((format) => format === value);

const isCountingMode = (value: string): value is CountingMode =>
	COUNTING_MODES.some((mode) => mode === value);

const isIncludeGroup = (value: string): value is IncludeGroup =>
	INCLUDE_GROUPS.some((group) => group === value);

const positiveInteger = (
	option: string,
	value: number | undefined,
	fallback: number,
): Effect.Effect<number, InvalidOption> =>
	value === undefined
		? Effect.succeed(fallback)
		: Number.isInteger(value) && value > 0
			? Effect.succeed(value)
			: Effect.fail(new InvalidOption({ option, detail: `must be a positive integer, got ${value}` }));

const confidence = (
	option: string,
	value: number | undefined,
	fallback: number,
): Effect.Effect<number, InvalidOption> =>
	value === undefined
		? Effect.succeed(fallback)
		: Number.isInteger(value) && value >= 0 && value <= MAX_CONFIDENCE
			? Effect.succeed(value)
			: Effect.fail(
					new InvalidOption({ option, detail: `must be an integer from 0 to ${MAX_CONFIDENCE}, got ${value}` }),
				);

const extensions = (
	option: string,
	value: readonly string[] | undefined,
	fallback: readonly string[],
): Effect.Effect<readonly string[], InvalidOption> => {
	if (value === undefined) return Effect.succeed(fallback);
	const normalized = value
		.map((ext) => ext.trim().replace(/^\./, "").toLowerCase())
		.filter((ext) => ext.length > 0);
	return normalized.length === 0
		? Effect.fail(new InvalidOption({ option, detail: "must name at least one extension" }))
		: Effect.succeed([...new Set(normalized)]);
};

const includeOrder = (
	value: readonly string[] | undefined,
): Effect.Effect<readonly IncludeGroup[], InvalidOption> => {
	if (value === undefined) return Effect.succeed(DEFAULT_CONFIG.includeOrder);
	const groups = value.filter(isIncludeGroup);
	const complete =
		groups.length === value.length &&
		new Set(groups).size === INCLUDE_GROUPS.length &&
		groups.length === INCLUDE_GROUPS.length;
	return complete
		? Effect.succeed(groups)
		: Effect.fail(
				new InvalidOption({
					option: "includeOrder",
					detail: `must list each of ${INCLUDE_GROUPS.join(", ")} exactly once`,
				}),
			);
};

/**
 * Merge options over the defaults and validate every field.
 *
 * @pure true
 * @effect Effect<LintConfig, ConfigError>
 *
 * @example
 * ```ts
 * const config = Effect.runSync(resolveConfig({ lineLength: 120, filters: "-legal" }));
 * // config.filters → [{ sign: "-", prefix: "build/include_alpha" }, { sign: "-", prefix: "legal" }]
 * ```
 */
export const resolveConfig = (
	options: LintOptions = {},
): Effect.Effect<LintConfig, ConfigError> =>
	Effect.gen(function* () {
		const userRules = yield* parseFilters(options.filters ?? [], KNOWN_CATEGORIES);

		const output = options.output ?? DEFAULT_CONFIG.output;
		if (!isOutputFormat(output)) {
			return yield* Effect.fail(
				new UnknownOutputFormat({ format: output, supported: OUTPUT_FORMATS }),
			);
		}
		const counting = options.counting ?? DEFAULT_CONFIG.counting;
		if (!isCountingMode(counting)) {
			return yield* Effect.fail(
				new InvalidOption({
					option: "counting",
					detail: `must be one of ${COUNTING_MODES.join(", ")}, got ${counting}`,
				}),
			);
		}

		return {
			lineLength: yield* positiveInteger("lineLength", options.lineLength, DEFAULT_CONFIG.lineLength),
			filters: [...DEFAULT_FILTERS, ...userRules],
			counting,
			output,
			minConfidence: yield* confidence("minConfidence", options.minConfidence, DEFAULT_CONFIG.minConfidence),
			failureConfidence: yield* confidence(
				"failureConfidence",
				options.failureConfidence,
				DEFAULT_CONFIG.failureConfidence,
			),
			headerExtensions: yield* extensions(
				"headerExtensions",
				options.headerExtensions,
				DEFAULT_CONFIG.headerExtensions,
			),
			sourceExtensions: yield* extensions(
				"sourceExtensions",
				options.sourceExtensions,
				DEFAULT_CONFIG.sourceExtensions,
			),
			includeOrder: yield* includeOrder(options.includeOrder),
			functionLengthThreshold: yield* positiveInteger(
				"functionLengthThreshold",
				options.functionLengthThreshold,
				DEFAULT_CONFIG.functionLengthThreshold,
			),
			concurrency: yield* positiveInteger("concurrency", options.concurrency, DEFAULT_CONFIG.concurrency),
		};
	});
