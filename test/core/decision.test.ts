// CHANGE: Specs for the exit code decision
// FORMAT THEOREM: ∀s: (s.hadError ∨ s.configFailed) ↔ computeExitCode(s) = 1

import { Effect } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	computeExitCode,
	computeExitCodeEffect,
	computeExitCodeFlow,
} from "../../src/core/decision.js";

describe("computeExitCode", () => {
	it("returns 0 for a clean run", () => {
		expect(computeExitCode({ hadError: false, configFailed: false })).toBe(0);
	});

	it("returns 1 for findings or a config failure", () => {
		expect(computeExitCode({ hadError: true, configFailed: false })).toBe(1);
		expect(computeExitCode({ hadError: false, configFailed: true })).toBe(1);
	});

	it("agrees across the plain, point-free and Effect variants", () => {
		fc.assert(
			fc.property(fc.boolean(), fc.boolean(), (hadError, configFailed) => {
				const state = { hadError, configFailed };
				const expected = hadError || configFailed ? 1 : 0;
				expect(computeExitCode(state)).toBe(expected);
				expect(computeExitCodeFlow(state)).toBe(expected);
				expect(Effect.runSync(computeExitCodeEffect(state))).toBe(expected);
			}),
		);
	});
});
