// CHANGE: Specs for the single-file pipeline
// INVARIANT: diagnostics are ordered by line; same-line findings keep emission order

import { describe, expect, it } from "vitest";

import { lintText } from "../../src/core/lint-file.js";
import { brief, config, lint, src } from "../utils/builders.js";

const COPYRIGHT = "// Copyright 2024 Example Author";

describe("lintText", () => {
	it("orders by line and keeps emission order within a line", () => {
		const categories = lint("int x;\t\n", "a.cc").map((d) => d.category);
		const tab = categories.indexOf("whitespace/tab");
		expect(tab).toBeGreaterThanOrEqual(0);
		expect(categories.indexOf("whitespace/end_of_line")).toBeGreaterThan(tab);
		expect(categories.indexOf("legal/copyright")).toBeGreaterThan(
			categories.indexOf("whitespace/end_of_line"),
		);
	});

	it("never returns lines out of order", () => {
		const diagnostics = lint(src(COPYRIGHT, "int a;\t", "int b; ", "long c;\t"));
		const lines = diagnostics.map((d) => d.line);
		expect(lines).toEqual([...lines].sort((a, b) => a - b));
	});

	it("binds every diagnostic to the path", () => {
		const diagnostics = lint(src("int a;\t"), "src/x.cc");
		expect(diagnostics.length).toBeGreaterThan(0);
		expect(diagnostics.every((d) => d.file === "src/x.cc")).toBe(true);
	});

	it("drops findings below the minimum confidence", () => {
		const diagnostics = lint(src(COPYRIGHT, "int a;\t"), "a.cc", { minConfidence: 2 });
		expect(diagnostics.some((d) => d.category === "whitespace/tab")).toBe(false);
	});

	it("drops filtered categories", () => {
		expect(brief(lint(src("int a;"), "a.cc", { filters: "-legal" }))).toEqual([]);
	});

	it("lets the caller decide a file is a header", () => {
		const guarded = (kind?: "header") =>
			lintText("notes.inc", src(COPYRIGHT, "int a;"), config(), kind).some(
				(d) => d.category === "build/header_guard",
			);
		expect(guarded("header")).toBe(true);
		expect(guarded()).toBe(false);
	});
});
