// CHANGE: Specs for option validation and defaults
// WHY: Configuration errors must surface before any file is read

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, resolveConfig } from "../../../src/core/config/index.js";
import type { LintOptions } from "../../../src/core/types/index.js";

const resolve = (options: LintOptions) => Effect.runSync(resolveConfig(options));
const failure = (options: LintOptions) => Effect.runSync(Effect.flip(resolveConfig(options)));

describe("resolveConfig: defaults and merging", () => {
	it("returns the defaults for no options", () => {
		expect(resolve({})).toEqual(DEFAULT_CONFIG);
	});

	it("puts user filters after the built-in ones", () => {
		expect(resolve({ filters: "-legal" }).filters).toEqual([
			{ sign: "-", prefix: "build/include_alpha" },
			{ sign: "-", prefix: "legal" },
		]);
	});

	it("normalizes extension lists", () => {
		expect(resolve({ headerExtensions: [".H", "hpp", "hpp"] }).headerExtensions).toEqual(["h", "hpp"]);
	});

	it("accepts a permutation of the include groups", () => {
		const order = ["c_system", "cpp_system", "own", "project", "third_party"];
		expect(resolve({ includeOrder: order }).includeOrder).toEqual(order);
	});
});

describe("resolveConfig: errors", () => {
	it("rejects a non-positive line length", () => {
		expect(failure({ lineLength: 0 })).toMatchObject({
			_tag: "InvalidOption",
			option: "lineLength",
			detail: "must be a positive integer, got 0",
		});
	});

	it("rejects an unknown output format", () => {
		expect(failure({ output: "xml" })).toMatchObject({ _tag: "UnknownOutputFormat", format: "xml" });
	});

	it("rejects an unknown counting mode", () => {
		expect(failure({ counting: "all" })).toMatchObject({ _tag: "InvalidOption", option: "counting" });
	});

	it("rejects confidences outside 0..5", () => {
		expect(failure({ minConfidence: 6 })).toMatchObject({
			_tag: "InvalidOption",
			option: "minConfidence",
			detail: "must be an integer from 0 to 5, got 6",
		});
	});

	it("rejects an empty extension list", () => {
		expect(failure({ sourceExtensions: [" "] })).toMatchObject({
			_tag: "InvalidOption",
			option: "sourceExtensions",
		});
	});

	it("rejects an incomplete include order", () => {
		expect(failure({ includeOrder: ["own", "c_system"] })).toMatchObject({
			_tag: "InvalidOption",
			option: "includeOrder",
		});
	});

	it("reports filter errors first", () => {
		expect(failure({ filters: "legal", output: "xml" })).toMatchObject({ _tag: "InvalidFilter" });
	});
});
