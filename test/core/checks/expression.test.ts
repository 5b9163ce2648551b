// CHANGE: Specs for bracket matching across lines

import { describe, expect, it } from "vitest";

import { closeExpression, expressionText } from "../../../src/core/checks/expression.js";

describe("closeExpression", () => {
	it("follows a call over two lines", () => {
		expect(closeExpression(["f(a,", "  b);"], 0, 1)).toEqual({ index: 1, column: 4 });
	});

	it("matches nested template brackets closed by >>", () => {
		const line = "std::vector<std::pair<int, int>> v;";
		expect(closeExpression([line], 0, line.indexOf("<"))).toEqual({
			index: 0,
			column: line.indexOf(">>") + 2,
		});
	});

	it("does not start on a shift or a comparison", () => {
		expect(closeExpression(["x = a << b;"], 0, 6)).toBeNull();
		expect(closeExpression(["x = a <= b;"], 0, 6)).toBeNull();
	});

	it("skips member access inside parentheses", () => {
		expect(closeExpression(["while (p->next) {"], 0, 6)).toEqual({ index: 0, column: 15 });
	});

	it("gives up on mismatched brackets and non-openers", () => {
		expect(closeExpression(["f(a]"], 0, 1)).toBeNull();
		expect(closeExpression(["abc"], 0, 0)).toBeNull();
		expect(closeExpression(["f(a,"], 0, 1)).toBeNull();
	});
});

describe("expressionText", () => {
	it("joins the inside of a multi-line expression", () => {
		expect(expressionText(["f(a,", "  b);"], 0, 1, { index: 1, column: 4 })).toBe("a, b");
	});

	it("slices a single-line expression", () => {
		expect(expressionText(["g(x + 1);"], 0, 1, { index: 0, column: 8 })).toBe("x + 1");
	});
});
