// CHANGE: Specs for naming conventions per construct kind

import { describe, expect, it } from "vitest";

import { namingChecker } from "../../../src/core/checks/naming.js";
import { context, src } from "../../utils/builders.js";

const check = (...lines: readonly string[]) => namingChecker.check(context(src(...lines)));

describe("readability/naming", () => {
	it("wants CamelCase type names", () => {
		expect(check("class my_widget {", "};", "struct Point {", "};")).toEqual([
			{
				line: 1,
				category: "readability/naming",
				confidence: 3,
				message: 'Type name "my_widget" should be CamelCase',
			},
		]);
	});

	it("leaves template specializations to the primary template's name", () => {
		expect(
			check("namespace std {", "template <>", "struct hash<Foo> {", "};", "}  // namespace std"),
		).toEqual([]);
	});

	it("still checks primary templates", () => {
		expect(check("template <typename T>", "struct my_box {", "};")).toEqual([
			{
				line: 2,
				category: "readability/naming",
				confidence: 3,
				message: 'Type name "my_box" should be CamelCase',
			},
		]);
	});

	it("wants lower_snake_case namespaces", () => {
		expect(check("namespace MyApp {", "}", "namespace net::io {", "}")).toEqual([
			{
				line: 1,
				category: "readability/naming",
				confidence: 3,
				message: 'Namespace name "MyApp" should be lower_snake_case',
			},
		]);
	});

	it("wants UPPER_SNAKE_CASE macros", () => {
		expect(check("#define maxSize 10", "#define MAX_SIZE 10")).toEqual([
			{
				line: 1,
				category: "readability/naming",
				confidence: 2,
				message: 'Macro name "maxSize" should be UPPER_SNAKE_CASE',
			},
		]);
	});

	it("wants kCamelCase constants at namespace scope only", () => {
		expect(
			check(
				"const int max_size = 10;",
				"constexpr int kMaxSize = 10;",
				"void f() {",
				"  const int n = 1;",
				"}",
			),
		).toEqual([
			{
				line: 1,
				category: "readability/naming",
				confidence: 2,
				message: 'Constant name "max_size" should be kCamelCase',
			},
		]);
	});
});
