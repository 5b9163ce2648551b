// CHANGE: Tests for reading command-line inputs
// INVARIANT: every path lands in exactly one of inputs, skipped or unreadable

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { hasCheckedExtension, readInputs } from "../../src/shell/files.js";
import { config } from "../utils/builders.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

const EXTENSIONS = "h, hh, hpp, hxx, h++, cuh, c, cc, cpp, cxx, c++, cu";

describe("hasCheckedExtension", () => {
	it("matches header and source extensions case-insensitively", () => {
		expect(hasCheckedExtension("src/a.HPP", config())).toBe(true);
		expect(hasCheckedExtension("src/a.cc", config())).toBe(true);
		expect(hasCheckedExtension("Makefile", config())).toBe(false);
		expect(hasCheckedExtension("src/a.cc", config({ sourceExtensions: ["cpp"] }))).toBe(false);
	});
});

describe("readInputs", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("sorts paths into inputs, skipped and unreadable", async () => {
		project = createTempProject({ "a.cc": "int x;\n", "notes.txt": "x\n" });
		const { file } = project;
		const batch = await Effect.runPromise(
			readInputs([file("a.cc"), file("notes.txt"), file("gone.cc")], config()),
		);

		expect(batch.inputs.map((input) => input.path)).toEqual([file("a.cc")]);
		const [input] = batch.inputs;
		const content = input?.content;
		expect(typeof content === "string" ? content : new TextDecoder().decode(content)).toBe("int x;\n");
		expect(batch.skipped).toEqual([`Ignoring ${file("notes.txt")}; not a valid file name (${EXTENSIONS})`]);
		expect(batch.unreadable).toEqual([`Skipping input '${file("gone.cc")}': Can't open for reading`]);
	});

	it("keeps the order of the paths", async () => {
		project = createTempProject({ "z.cc": "", "b.h": "", "m.cpp": "" });
		const { file } = project;
		const paths = [file("z.cc"), file("b.h"), file("m.cpp")];
		const batch = await Effect.runPromise(readInputs(paths, config({ concurrency: 3 })));
		expect(batch.inputs.map((input) => input.path)).toEqual(paths);
	});
});
