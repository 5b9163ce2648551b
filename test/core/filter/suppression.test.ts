// CHANGE: Specs for NOLINT / NOLINTNEXTLINE suppression
// INVARIANT: a marker affects exactly one line

import { describe, expect, it } from "vitest";

import { KNOWN_CATEGORIES } from "../../../src/core/checks/index.js";
import {
	buildSuppressionIndex,
	type DiagnosticFilter,
	isSuppressed,
	shouldEmit,
} from "../../../src/core/filter/index.js";
import { finding } from "../../../src/core/types/index.js";
import { brief, cleanse, lint, ofCategory, src } from "../../utils/builders.js";

const COPYRIGHT = "// Copyright 2024 Example Author";

describe("buildSuppressionIndex", () => {
	const scan = buildSuppressionIndex(
		cleanse(src("int a;  // NOLINT(whitespace)", "// NOLINTNEXTLINE", "int b;")).lines,
		KNOWN_CATEGORIES,
	);

	it("silences listed prefixes on the marker's line", () => {
		expect(isSuppressed(scan.index, 1, "whitespace/tab")).toBe(true);
		expect(isSuppressed(scan.index, 1, "build/include")).toBe(false);
	});

	it("silences everything on the line after NOLINTNEXTLINE", () => {
		expect(isSuppressed(scan.index, 3, "legal/copyright")).toBe(true);
		expect(isSuppressed(scan.index, 2, "legal/copyright")).toBe(false);
	});

	it("merges markers that target the same line", () => {
		const merged = buildSuppressionIndex(
			cleanse(src("// NOLINTNEXTLINE(build/include)", "int a;  // NOLINT(whitespace/tab)")).lines,
			KNOWN_CATEGORIES,
		);
		expect(merged.index.get(2)).toEqual(["build/include", "whitespace/tab"]);
	});

	it("drops and reports unknown categories", () => {
		const unknown = buildSuppressionIndex(
			cleanse(src("int a;  // NOLINT(made/up)")).lines,
			KNOWN_CATEGORIES,
		);
		expect(unknown.index.size).toBe(0);
		expect(unknown.anomalies).toEqual([
			{
				line: 1,
				category: "readability/nolint",
				confidence: 5,
				message: "Unknown NOLINT error category: made/up",
			},
		]);
	});
});

describe("shouldEmit", () => {
	const filter: DiagnosticFilter = {
		rules: [{ sign: "-", prefix: "legal" }],
		minConfidence: 3,
		suppressions: new Map<number, "all" | readonly string[]>([[4, "all"]]),
	};

	it("applies confidence, rules and markers together", () => {
		expect(shouldEmit(filter, finding(1, "whitespace/tab", 3, "m"))).toBe(true);
		expect(shouldEmit(filter, finding(1, "whitespace/tab", 2, "m"))).toBe(false);
		expect(shouldEmit(filter, finding(1, "legal/copyright", 5, "m"))).toBe(false);
		expect(shouldEmit(filter, finding(4, "whitespace/tab", 5, "m"))).toBe(false);
	});
});

describe("suppression through the pipeline", () => {
	it("keeps findings on other lines", () => {
		const diagnostics = lint(src(COPYRIGHT, "int a;\t// NOLINT(whitespace/tab)", "int b;\t"));
		expect(brief(ofCategory(diagnostics, "whitespace/tab"))).toEqual(["3:whitespace/tab"]);
	});

	it("suppresses only the next line after NOLINTNEXTLINE", () => {
		const diagnostics = lint(
			src(COPYRIGHT, "// NOLINTNEXTLINE(whitespace/tab)", "int a;\t", "int b;\t"),
		);
		expect(brief(ofCategory(diagnostics, "whitespace/tab"))).toEqual(["4:whitespace/tab"]);
	});

	it("silences a brace finding on the marked line", () => {
		const unmarked = lint(src(COPYRIGHT, "void f(){", "}"));
		expect(brief(ofCategory(unmarked, "whitespace/braces"))).toEqual(["2:whitespace/braces"]);

		const marked = lint(src(COPYRIGHT, "void f(){  // NOLINT(whitespace/braces)", "}"));
		expect(marked.filter((d) => d.line === 2)).toEqual([]);
	});

	it("reports unknown NOLINT categories", () => {
		const diagnostics = lint(src(COPYRIGHT, "int a;  // NOLINT(made/up)"));
		expect(brief(ofCategory(diagnostics, "readability/nolint"))).toEqual(["2:readability/nolint"]);
	});
});
