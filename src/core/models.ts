// CHANGE: Exit decision models for the style checker
// WHY: The shell maps a run outcome to a process exit code through pure data
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the checker process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing the exit code.
 *
 * @remarks
 * - @pure true
 * - @precondition hadError comes from the run report
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hadError: boolean;
	readonly configFailed: boolean;
}
