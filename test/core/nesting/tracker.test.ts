// CHANGE: Specs for the brace/keyword scope tracker
// WHY: Class, namespace and function context drive indentation, naming, explicit and length checks
// PURITY: CORE
// INVARIANT: balanced input leaves no open scope and no anomaly
// COMPLEXITY: O(n) per assertion

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	atNamespaceScope,
	describeFrame,
	enclosingClass,
	inFunction,
	innermostFrame,
	snapshotAt,
} from "../../../src/core/nesting/index.js";
import { nest, src } from "../../utils/builders.js";

const SAMPLE = src(
	"namespace app {",
	"class Widget {",
	" public:",
	"  int size() const { return 1; }",
	"};",
	"void run() {",
	"  if (true) {",
	"  }",
	"}",
	"}  // namespace app",
);

const closed = (text: string): readonly string[] =>
	nest(text).records.map((r) => `${describeFrame(r.frame)}@${r.frame.openedAt}-${r.closedAt}`);

describe("NestingTracker: frames", () => {
	it("records every construct when it closes", () => {
		expect(closed(SAMPLE)).toEqual([
			"function size@4-4",
			"class Widget@2-5",
			"function run@6-9",
			"namespace app@1-10",
		]);
	});

	it("publishes the stack as it was at the start of each line", () => {
		const trace = nest(SAMPLE);
		expect(snapshotAt(trace, 1).scopes).toEqual([]);
		expect(snapshotAt(trace, 3).scopes.map((f) => f.kind)).toEqual(["namespace", "class"]);
		expect(snapshotAt(trace, 8).scopes.map((f) => [f.kind, f.depth])).toEqual([
			["namespace", 0],
			["function", 1],
		]);
		expect(trace.finalScopes).toEqual([]);
		expect(trace.anomalies).toEqual([]);
	});

	it("tracks access labels of class bodies", () => {
		const trace = nest(SAMPLE);
		expect(innermostFrame(trace, 3)?.access).toBe("private");
		expect(innermostFrame(trace, 4)?.access).toBe("public");
	});

	it("answers scope queries", () => {
		const trace = nest(SAMPLE);
		expect(enclosingClass(trace, 4)?.name).toBe("Widget");
		expect(enclosingClass(trace, 7)).toBeUndefined();
		expect(inFunction(trace, 8)).toBe(true);
		expect(inFunction(trace, 4)).toBe(false);
		expect(atNamespaceScope(trace, 2)).toBe(true);
		expect(atNamespaceScope(trace, 3)).toBe(false);
	});

	it("does not push frames for forward declarations", () => {
		const trace = nest(src("class Later;", "struct Point p;", "enum class Color;"));
		expect(trace.records).toEqual([]);
		expect(trace.anomalies).toEqual([]);
	});

	it("keeps enum class as an enum and skips inline for namespaces", () => {
		expect(closed(src("enum class Color { kRed };", "inline namespace v1 {", "}"))).toEqual([
			"enum Color@1-1",
			"namespace v1@2-3",
		]);
	});

	it("joins nested namespace names", () => {
		expect(closed(src("namespace a::b {", "}"))).toEqual(["namespace a::b@1-2"]);
	});

	it("names anonymous namespaces as such", () => {
		expect(closed(src("namespace {", "}"))).toEqual(["anonymous namespace@1-2"]);
	});

	it("treats a template header as part of the following class", () => {
		const trace = nest(src("template <typename T>", "class Box {", "};"));
		expect(trace.records.map((r) => [r.frame.kind, r.frame.name, r.frame.specialized])).toEqual([
			["class", "Box", false],
		]);
	});

	it("marks a class named with template arguments as a specialization", () => {
		const trace = nest(
			src("namespace std {", "template <>", "struct hash<Foo> {", "};", "}  // namespace std"),
		);
		expect(trace.records.map((r) => [r.frame.kind, r.frame.name, r.frame.specialized])).toEqual([
			["struct", "hash", true],
			["namespace", "std", false],
		]);
	});

	it("does not mistake a templated base class for a specialization", () => {
		const trace = nest(src("class Foo : public Base<int> {", "};"));
		expect(trace.records.map((r) => [r.frame.name, r.frame.specialized])).toEqual([["Foo", false]]);
	});

	it("keeps constructor initializer braces inside the function", () => {
		expect(closed(src("Widget::Widget(int n) : items_{n}, size_(n) {", "}"))).toEqual([
			"function Widget@1-2",
		]);
	});

	it("does not open a function for brace initializers after =", () => {
		const trace = nest(src("void f() {", "  int v[] = {1, 2};", "}"));
		expect(trace.records.map((r) => describeFrame(r.frame))).toEqual(["function f"]);
	});
});

describe("NestingTracker: anomalies", () => {
	it("reports an unmatched closing brace", () => {
		expect(nest(src("int a;", "}")).anomalies).toEqual([
			{ line: 2, category: "readability/braces", confidence: 4, message: "Unmatched closing brace" },
		]);
	});

	it("reports an unclosed class at its opening line", () => {
		const trace = nest(src("class Open {", "  int x;"));
		expect(trace.anomalies).toEqual([
			{
				line: 1,
				category: "build/class",
				confidence: 5,
				message: "Failed to find complete declaration of class Open",
			},
		]);
		expect(trace.records).toEqual([
			{ frame: expect.objectContaining({ kind: "class", name: "Open" }), closedAt: null },
		]);
	});

	it("reports an unclosed function body", () => {
		expect(nest(src("void f() {")).anomalies).toEqual([
			{
				line: 1,
				category: "readability/braces",
				confidence: 4,
				message: "Could not find the closing brace of function f",
			},
		]);
	});

	it("reports an open conditional and a stray #endif", () => {
		expect(nest(src("#ifdef A", "int a;")).anomalies).toEqual([
			{ line: 1, category: "build/endif", confidence: 4, message: "Could not find #endif for #ifdef" },
		]);
		expect(nest(src("#endif")).anomalies).toEqual([
			{ line: 1, category: "build/endif", confidence: 4, message: "#endif without matching #if" },
		]);
	});

	it("numbers the branches of a conditional group", () => {
		const trace = nest(src("#if A", "int a;", "#elif B", "int b;", "#else", "int c;", "#endif"));
		expect([2, 4, 6].map((line) => snapshotAt(trace, line).conditionals)).toEqual([
			[{ kind: "conditional", directive: "if", openedAt: 1, branch: 0 }],
			[{ kind: "conditional", directive: "if", openedAt: 1, branch: 1 }],
			[{ kind: "conditional", directive: "if", openedAt: 1, branch: 2 }],
		]);
		expect(trace.finalConditionals).toEqual([]);
	});

	it("restores the first branch's stack after #else", () => {
		const trace = nest(
			src("#ifdef A", "void f() {", "#else", "void f(int) {", "#endif", "}"),
		);
		expect(trace.anomalies).toEqual([]);
		expect(trace.records.map((r) => [describeFrame(r.frame), r.closedAt])).toEqual([
			["function f", 6],
		]);
	});
});

const blockLines = (depths: readonly number[]): readonly string[] =>
	depths.flatMap((n) => ["{".repeat(n), "}".repeat(n)]);

describe("NestingTracker: invariants", () => {
	it("leaves nothing open for balanced braces", () => {
		fc.assert(
			fc.property(fc.array(fc.integer({ min: 1, max: 4 }), { maxLength: 8 }), (depths) => {
				const trace = nest(src(...blockLines(depths)));
				expect(trace.finalScopes).toEqual([]);
				expect(trace.anomalies).toEqual([]);
			}),
		);
	});

	it("publishes one snapshot per line", () => {
		fc.assert(
			fc.property(fc.array(fc.integer({ min: 1, max: 4 }), { maxLength: 8 }), (depths) => {
				const lines = blockLines(depths);
				const text = lines.length === 0 ? "" : src(...lines);
				expect(nest(text).snapshots.length).toBe(lines.length);
			}),
		);
	});
});
