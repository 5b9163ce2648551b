// CHANGE: Command-line parsing for the style checker
// WHY: Flags map onto LintOptions through a handler table; validation of values is left to resolveConfig
// PURITY: SHELL (reads process.argv by default)
// EFFECT: Effect<CLIOptions, InvalidOption>
// INVARIANT: Positional arguments keep their order; every `--flag=value` is handled at most by one handler
// COMPLEXITY: O(n) where n = |argv|

import { Effect } from "effect";

import { InvalidOption } from "../../core/errors.js";
import type { LintOptions } from "../../core/types/index.js";

/**
 * Parsed command line.
 *
 * @property files Paths in the order given
 * @property options Values that override the config file
 * @property configPath Explicit `--config=` file, if any
 */
export interface CLIOptions {
	readonly files: readonly string[];
	readonly options: LintOptions;
	readonly quiet: boolean;
	readonly help: boolean;
	readonly configPath?: string;
}

export const USAGE = `Usage: cxxstyle [--verbose=#] [--output=emacs|vs7|eclipse|junit|sed|gsed]
                [--filter=-x,+y,...] [--counting=total|toplevel|detailed]
                [--linelength=digits] [--headers=x,y,...] [--extensions=x,y,...]
                [--concurrency=digits] [--config=file] [--quiet]
        <file> [file] ...

  Each reported line ends in [category] [confidence]. Findings below the
  --verbose level are not reported. Suppress a line with // NOLINT or
  // NOLINT(category); the next line with // NOLINTNEXTLINE.
`;

type FlagHandler = (value: string, current: CLIOptions) => CLIOptions;

const list = (value: string): readonly string[] =>
	value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);

const withOption = (current: CLIOptions, options: LintOptions): CLIOptions => ({
	...current,
	options: { ...current.options, ...options },
});

const appendFilters = (current: LintOptions, value: string): readonly string[] => {
	const previous = current.filters ?? [];
	return [...(typeof previous === "string" ? [previous] : previous), value];
};

// Numbers are parsed leniently here; resolveConfig rejects NaN and out-of-range values
const handlers: Readonly<Record<string, FlagHandler | undefined>> = {
	"--filter": (value, current) =>
		withOption(current, { filters: appendFilters(current.options, value) }),
	"--linelength": (value, current) =>
		withOption(current, { lineLength: Number(value) }),
	"--output": (value, current) => withOption(current, { output: value }),
	"--counting": (value, current) => withOption(current, { counting: value }),
	"--verbose": (value, current) =>
		withOption(current, { minConfidence: Number(value) }),
	"--v": (value, current) => withOption(current, { minConfidence: Number(value) }),
	"--headers": (value, current) =>
		withOption(current, { headerExtensions: list(value) }),
	"--extensions": (value, current) =>
		withOption(current, { sourceExtensions: list(value) }),
	"--concurrency": (value, current) =>
		withOption(current, { concurrency: Number(value) }),
	"--config": (value, current) => ({ ...current, configPath: value }),
};

const INITIAL: CLIOptions = { files: [], options: {}, quiet: false, help: false };

const SWITCHES: Readonly<Record<string, ((current: CLIOptions) => CLIOptions) | undefined>> = {
	"--quiet": (current) => ({ ...current, quiet: true }),
	"--help": (current) => ({ ...current, help: true }),
	"-h": (current) => ({ ...current, help: true }),
};

/**
 * Apply one argument to the options parsed so far.
 *
 * @pure true
 */
function processArgument(
	arg: string,
	current: CLIOptions,
): Effect.Effect<CLIOptions, InvalidOption> {
	if (!arg.startsWith("-")) {
		return Effect.succeed({ ...current, files: [...current.files, arg] });
	}

	const toggle = SWITCHES[arg];
	if (toggle !== undefined) return Effect.succeed(toggle(current));

	const eq = arg.indexOf("=");
	const flag = eq === -1 ? arg : arg.slice(0, eq);
	const handler = handlers[flag];
	if (handler === undefined) {
		return Effect.fail(new InvalidOption({ option: flag, detail: "unknown flag" }));
	}
	if (eq === -1) {
		return Effect.fail(new InvalidOption({ option: flag, detail: `expects a value: ${flag}=...` }));
	}
	return Effect.succeed(handler(arg.slice(eq + 1), current));
}

/**
 * Parse command-line arguments.
 *
 * @effect Effect<CLIOptions, InvalidOption>
 *
 * @example
 * ```ts
 * Effect.runSync(parseCLIArgs(["--linelength=120", "--filter=-legal", "a.cc"]));
 * // { files: ["a.cc"], options: { lineLength: 120, filters: ["-legal"] }, quiet: false, help: false }
 * ```
 */
export const parseCLIArgs = (
	argv: readonly string[] = process.argv.slice(2),
): Effect.Effect<CLIOptions, InvalidOption> =>
	Effect.reduce(
		argv.filter((arg) => arg.length > 0),
		INITIAL,
		(current, arg) => processArgument(arg, current),
	);
