// CHANGE: Pure decision function computing the exit code using Effect
// WHY: Centralize termination logic in the core with Effect composition support
// FORMAT THEOREM: ∀s ∈ State: (s.hadError ∨ s.configFailed) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, flow, pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

const failed = (state: DecisionState): boolean => state.hadError || state.configFailed;

const toExitCode = (hasErrors: boolean): ExitCode => (hasErrors ? 1 : 0);

/**
 * Computes process exit code from the run outcome.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.hadError ∨ state.configFailed) → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hadError: true, configFailed: false }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, failed, toExitCode);

/**
 * Point-free variant for composition.
 *
 * @pure true
 */
export const computeExitCodeFlow = flow(failed, toExitCode);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @invariant Result is Effect.succeed(exitCode) where exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * const program = pipe(
 *   runLint(inputs, options),
 *   Effect.map((report) => ({ hadError: report.hadError, configFailed: false })),
 *   Effect.flatMap(computeExitCodeEffect),
 * );
 * ```
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
