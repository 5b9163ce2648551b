// CHANGE: Specs for error tallies and the summary text
// INVARIANT: mergeTallies is associative with EMPTY_TALLY as identity

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	EMPTY_TALLY,
	mergeTallies,
	renderSummary,
	type Tally,
	tallyDiagnostics,
} from "../../../src/core/report/index.js";
import { diag } from "../../utils/builders.js";

const DIAGNOSTICS = [
	diag(),
	diag({ category: "whitespace/braces" }),
	diag({ file: "b.cc", category: "legal/copyright" }),
];

describe("tallyDiagnostics", () => {
	it("counts by top-level category", () => {
		expect(tallyDiagnostics(DIAGNOSTICS, "toplevel")).toEqual({
			total: 3,
			byCategory: { whitespace: 2, legal: 1 },
			byFile: { "a.cc": 2, "b.cc": 1 },
		});
	});

	it("counts by full category", () => {
		expect(tallyDiagnostics(DIAGNOSTICS, "detailed").byCategory).toEqual({
			"whitespace/tab": 1,
			"whitespace/braces": 1,
			"legal/copyright": 1,
		});
	});

	it("keeps only totals in total mode", () => {
		expect(tallyDiagnostics(DIAGNOSTICS, "total").byCategory).toEqual({});
	});
});

describe("renderSummary", () => {
	it("prints sorted category lines before the total", () => {
		expect(renderSummary(tallyDiagnostics(DIAGNOSTICS, "detailed"), "detailed")).toBe(
			"Category 'legal/copyright' errors found: 1\n" +
				"Category 'whitespace/braces' errors found: 1\n" +
				"Category 'whitespace/tab' errors found: 1\n" +
				"Total errors found: 3\n",
		);
	});

	it("prints only the total in total mode", () => {
		expect(renderSummary(tallyDiagnostics(DIAGNOSTICS, "total"), "total")).toBe(
			"Total errors found: 3\n",
		);
	});
});

const tallyArbitrary: fc.Arbitrary<Tally> = fc
	.array(
		fc.record({
			file: fc.constantFrom("a.cc", "b.cc", "c.h"),
			category: fc.constantFrom("whitespace/tab", "legal/copyright", "build/include"),
		}),
		{ maxLength: 6 },
	)
	.map((entries) =>
		tallyDiagnostics(
			entries.map((e) => diag(e)),
			"toplevel",
		),
	);

describe("mergeTallies", () => {
	it("is associative with an identity", () => {
		fc.assert(
			fc.property(tallyArbitrary, tallyArbitrary, tallyArbitrary, (a, b, c) => {
				expect(mergeTallies(mergeTallies(a, b), c)).toEqual(mergeTallies(a, mergeTallies(b, c)));
				expect(mergeTallies(a, EMPTY_TALLY)).toEqual(a);
				expect(mergeTallies(EMPTY_TALLY, a)).toEqual(a);
			}),
		);
	});
});
