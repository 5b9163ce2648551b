#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns a report; BIN prints it and exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) orchestration; linting cost lives in APP

import { Effect, pipe } from "effect";

import { lintFiles } from "../app/lintFiles.js";
import { resolveConfig } from "../core/config/index.js";
import { computeExitCode } from "../core/decision.js";
import type { ExitCode } from "../core/models.js";
import { loadOptionsFile, parseCLIArgs, USAGE } from "../shell/config/index.js";
import { readInputs } from "../shell/files.js";
import { describeConfigError, printNotices, printReport } from "../shell/report.js";

const program: Effect.Effect<ExitCode> = pipe(
	Effect.gen(function* () {
		const cli = yield* parseCLIArgs();
		if (cli.help || cli.files.length === 0) {
			process.stderr.write(USAGE);
			return computeExitCode({ hadError: false, configFailed: !cli.help });
		}
		const fileOptions = yield* loadOptionsFile(cli.configPath);
		const config = yield* resolveConfig({ ...fileOptions, ...cli.options });
		const batch = yield* readInputs(cli.files, config);
		printNotices([...batch.skipped, ...batch.unreadable]);

		const report = yield* lintFiles(batch.inputs, config);
		printReport(report, cli.quiet);
		return computeExitCode({
			hadError: report.hadError || batch.unreadable.length > 0,
			configFailed: false,
		});
	}),
	Effect.catchAll((error) =>
		Effect.sync((): ExitCode => {
			console.error(describeConfigError(error));
			return computeExitCode({ hadError: false, configFailed: true });
		}),
	),
);

/**
 * CLI entry point for cxxstyle.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 when no reportable finding, otherwise 1
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(program);
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
