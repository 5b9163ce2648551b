// CHANGE: Specs for discouraged constructs and implicit constructors

import { describe, expect, it } from "vitest";

import {
	constructChecker,
	isSingleArgument,
	splitParameters,
} from "../../../src/core/checks/constructs.js";
import { context, src } from "../../utils/builders.js";

const check = (...lines: readonly string[]) => constructChecker.check(context(src(...lines)));

describe("runtime/int", () => {
	it("wants unsigned short for ports", () => {
		expect(check("short port = 80;")).toEqual([
			{
				line: 1,
				category: "runtime/int",
				confidence: 4,
				message: 'Use "unsigned short" for ports, not "short"',
			},
		]);
	});

	it("accepts an unsigned short port", () => {
		expect(check("void f(unsigned short port);")).toEqual([]);
	});

	it("wants sized integer types", () => {
		expect(check("long count = 0;")).toEqual([
			{
				line: 1,
				category: "runtime/int",
				confidence: 4,
				message: "Use int16/int64/etc, rather than the C type long",
			},
		]);
	});

	it("accepts long double", () => {
		expect(check("long double ratio = 0;")).toEqual([]);
	});
});

describe("runtime/printf", () => {
	it("rejects sprintf, strcpy and strcat", () => {
		expect(check('sprintf(buf, "%d", n);', "strcpy(dst, src);")).toEqual([
			{
				line: 1,
				category: "runtime/printf",
				confidence: 5,
				message: "Never use sprintf. Use snprintf instead.",
			},
			{
				line: 2,
				category: "runtime/printf",
				confidence: 4,
				message: "Almost always, snprintf is better than strcpy",
			},
		]);
	});

	it("prefers sizeof over a literal snprintf size", () => {
		expect(check('snprintf(buf, 10, "%s", s);')).toEqual([
			{
				line: 1,
				category: "runtime/printf",
				confidence: 3,
				message: "If you can, use sizeof(buf) instead of 10 as the 2nd arg to snprintf.",
			},
		]);
	});
});

describe("runtime/printf across lines", () => {
	it("reads a call split over several lines as one statement", () => {
		expect(check("snprintf(buf,", '         10, "%s", s);')).toEqual([
			{
				line: 1,
				category: "runtime/printf",
				confidence: 3,
				message: "If you can, use sizeof(buf) instead of 10 as the 2nd arg to snprintf.",
			},
		]);
	});
});

describe("readability/constructors", () => {
	it("wants copy-disabling macros in the private section", () => {
		const findings = check(
			"class Foo {",
			" public:",
			"  DISALLOW_COPY_AND_ASSIGN(Foo);",
			" private:",
			"  DISALLOW_IMPLICIT_CONSTRUCTORS(Foo);",
			"};",
		);
		expect(findings).toEqual([
			{
				line: 3,
				category: "readability/constructors",
				confidence: 3,
				message: "DISALLOW_COPY_AND_ASSIGN must be in the private: section",
			},
		]);
	});

	it("treats struct members as public by default", () => {
		expect(check("struct Bar {", "  DISALLOW_COPY_AND_ASSIGN(Bar);", "};")).toEqual([
			{
				line: 2,
				category: "readability/constructors",
				confidence: 3,
				message: "DISALLOW_COPY_AND_ASSIGN must be in the private: section",
			},
		]);
	});

	it("accepts the default private section of a class", () => {
		expect(check("class Baz {", "  DISALLOW_COPY_AND_ASSIGN(Baz);", "};")).toEqual([]);
	});
});

describe("runtime/explicit", () => {
	it("flags constructors callable with one argument", () => {
		const findings = check(
			"class Foo {",
			" public:",
			"  Foo(int x);",
			"  Foo(const Foo& other);",
			"  explicit Foo(double d);",
			"  Foo(int a, int b = 0);",
			"  Foo();",
			"};",
		);
		expect(findings.map((f) => [f.line, f.category, f.confidence])).toEqual([
			[3, "runtime/explicit", 5],
			[6, "runtime/explicit", 5],
		]);
	});

	it("ignores unions", () => {
		expect(check("union Value {", "  Value(int x);", "};")).toEqual([]);
	});
});

describe("parameter helpers", () => {
	it("splits on top-level commas only", () => {
		expect(splitParameters("std::map<int, int> m, int n = 0")).toEqual([
			"std::map<int, int> m",
			"int n = 0",
		]);
	});

	it("rejects copy, move and initializer_list constructors", () => {
		expect(isSingleArgument(["Foo&& other"], "Foo")).toBe(false);
		expect(isSingleArgument(["std::initializer_list<int> items"], "Foo")).toBe(false);
		expect(isSingleArgument(["void"], "Foo")).toBe(false);
		expect(isSingleArgument(["int n"], "Foo")).toBe(true);
	});
});
