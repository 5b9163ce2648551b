// CHANGE: Specs for per-diagnostic output layouts
// INVARIANT: one diagnostic renders to exactly one line

import { describe, expect, it } from "vitest";

import { formatDiagnostic } from "../../../src/core/report/index.js";
import { diag } from "../../utils/builders.js";

const tab = diag({ line: 3 });

describe("formatDiagnostic", () => {
	it("renders the default layout", () => {
		expect(formatDiagnostic("emacs", tab)).toBe(
			"a.cc:3:  Tab found; better to use spaces  [whitespace/tab] [1]",
		);
	});

	it("renders the Visual Studio layout", () => {
		expect(formatDiagnostic("vs7", tab)).toBe(
			"a.cc(3): error cxxstyle: [whitespace/tab] Tab found; better to use spaces [1]",
		);
	});

	it("renders the Eclipse layout", () => {
		expect(formatDiagnostic("eclipse", tab)).toBe(
			"a.cc:3: warning: Tab found; better to use spaces  [whitespace/tab] [1]",
		);
	});

	it("falls back to the default layout for junit", () => {
		expect(formatDiagnostic("junit", tab)).toBe(formatDiagnostic("emacs", tab));
	});

	it("emits a sed command for fixable messages", () => {
		expect(formatDiagnostic("sed", tab)).toBe(
			"sed -i '3s/\\t/  /g' a.cc # Tab found; better to use spaces  [whitespace/tab] [1]",
		);
		expect(formatDiagnostic("gsed", tab)).toBe(
			"gsed -i '3s/\\t/  /g' a.cc # Tab found; better to use spaces  [whitespace/tab] [1]",
		);
	});

	it("emits a comment for messages without a fixup", () => {
		expect(formatDiagnostic("sed", diag({ line: 3, message: "Other" }))).toBe(
			'# a.cc:3:  "Other"  [whitespace/tab] [1]',
		);
	});

	it("never spans lines", () => {
		for (const format of ["emacs", "vs7", "eclipse", "sed", "gsed"] as const) {
			expect(formatDiagnostic(format, tab)).not.toContain("\n");
		}
	});
});
