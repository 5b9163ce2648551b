// CHANGE: Per-file results and the run report
// PURITY: CORE
// INVARIANT: failure !== null ⇒ the file's pass was abandoned and diagnostics holds one unprocessable entry

import type { Diagnostic } from "../types/index.js";
import type { Tally } from "./tally.js";

/**
 * Outcome of one file's pass, already filtered and ordered by line.
 */
export interface FileResult {
	readonly path: string;
	readonly diagnostics: readonly Diagnostic[];
	readonly failure: string | null;
}

/**
 * What a run hands back to its caller.
 *
 * @property output Rendered diagnostics in the configured format
 * @property summary Tally lines for the error stream
 * @property hadError Whether any result reached the failure threshold or any file failed
 */
export interface LintReport {
	readonly output: string;
	readonly summary: string;
	readonly hadError: boolean;
	readonly tally: Tally;
	readonly files: readonly FileResult[];
}
