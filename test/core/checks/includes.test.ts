// CHANGE: Specs for include grouping, ordering, duplicates and directory naming
// WHY: Include sections reset at conditional directives and exclusive branches never duplicate each other

import { describe, expect, it } from "vitest";

import { headerCatalog } from "../../../src/core/checks/catalog.js";
import {
	canonicalIncludePath,
	classifyInclude,
	exclusiveBranches,
	groupLabel,
	includeChecker,
} from "../../../src/core/checks/includes.js";
import { brief, context, src } from "../../utils/builders.js";

const FILE = "src/net/socket.cc";

const check = (...lines: readonly string[]) => includeChecker.check(context(src(...lines), FILE));

describe("classifyInclude", () => {
	const classify = (path: string, quoted: boolean) =>
		classifyInclude({ line: 1, path, quoted }, FILE, ["h"], headerCatalog());

	it("recognizes the header a source file implements", () => {
		expect(classify("net/socket.h", true)).toBe("own");
		expect(classify("net/other.h", true)).toBe("project");
	});

	it("splits system headers by language", () => {
		expect(classify("stdio.h", false)).toBe("c_system");
		expect(classify("vector", false)).toBe("cpp_system");
		expect(classify("gtest/gtest.h", false)).toBe("third_party");
	});

	it("labels groups for messages", () => {
		expect(groupLabel("c_system")).toBe("C system header");
		expect(groupLabel("own")).toBe("header this file implements");
	});
});

describe("includeChecker", () => {
	it("accepts the canonical order", () => {
		expect(
			check('#include "net/socket.h"', "#include <sys/types.h>", "#include <vector>", '#include "base/log.h"'),
		).toEqual([]);
	});

	it("reports a C header after a C++ header", () => {
		expect(check("#include <vector>", "#include <stdio.h>")).toEqual([
			{
				line: 2,
				category: "build/include_order",
				confidence: 4,
				message: "Found C system header after C++ system header",
			},
		]);
	});

	it("reports duplicates with the first location", () => {
		expect(check("#include <vector>", "#include <vector>")).toEqual([
			{
				line: 2,
				category: "build/include",
				confidence: 4,
				message: '"vector" already included at src/net/socket.cc:1',
			},
		]);
	});

	it("wants a directory in quoted includes", () => {
		expect(brief(check('#include "util.h"'))).toEqual(["1:build/include_subdir"]);
	});

	it("reports alphabetical order inside a group", () => {
		expect(check("#include <vector>", "#include <map>")).toEqual([
			{
				line: 2,
				category: "build/include_alpha",
				confidence: 4,
				message: 'Include "map" not in alphabetical order',
			},
		]);
	});

	it("starts a new section at conditionals and forgets exclusive branches", () => {
		expect(
			check(
				"#include <vector>",
				"#ifdef _WIN32",
				"#include <windows.h>",
				"#else",
				"#include <windows.h>",
				"#endif",
				"#include <stdio.h>",
			),
		).toEqual([]);
	});

	it("still reports a repeat after the conditional group closes", () => {
		expect(
			check(
				"#ifdef USE_VECTOR",
				"#include <vector>",
				"#else",
				"#include <vector>",
				"#endif",
				"#include <vector>",
			),
		).toEqual([
			{
				line: 6,
				category: "build/include",
				confidence: 4,
				message: '"vector" already included at src/net/socket.cc:2',
			},
		]);
	});

	it("tells branches of the same group apart", () => {
		const ifBranch = { kind: "conditional", directive: "ifdef", openedAt: 3, branch: 0 } as const;
		expect(exclusiveBranches([ifBranch], [{ ...ifBranch, branch: 1 }])).toBe(true);
		expect(exclusiveBranches([ifBranch], [ifBranch])).toBe(false);
		expect(exclusiveBranches([ifBranch], [])).toBe(false);
	});

	it("canonicalizes paths for sorting", () => {
		expect(canonicalIncludePath("Base/Foo-Bar-inl.h")).toBe("base/foo_bar.h");
	});
});
