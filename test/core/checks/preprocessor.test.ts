// CHANGE: Specs for text after #endif

import { describe, expect, it } from "vitest";

import { preprocessorChecker } from "../../../src/core/checks/preprocessor.js";
import { context, src } from "../../utils/builders.js";

describe("build/endif_comment", () => {
	it("flags bare text after #endif", () => {
		expect(preprocessorChecker.check(context(src("#ifdef DEBUG", "#endif DEBUG")))).toEqual([
			{
				line: 2,
				category: "build/endif_comment",
				confidence: 5,
				message: "Uncommented text after #endif is non-standard.  Use a comment.",
			},
		]);
	});

	it("accepts a comment after #endif", () => {
		expect(
			preprocessorChecker.check(context(src("#ifdef DEBUG", "#endif  // DEBUG", "#if X", "#endif"))),
		).toEqual([]);
	});
});
