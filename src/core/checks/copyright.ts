// CHANGE: Copyright notice presence check
// PURITY: CORE
// COMPLEXITY: O(1) (only the head of the file is read)

import { finding } from "../types/index.js";
import type { Checker } from "./types.js";

const HEAD_LINES = 10;
const COPYRIGHT = /Copyright/i;

export const copyrightChecker: Checker = {
	id: "copyright",
	categories: ["legal/copyright"],
	check: (ctx) =>
		ctx.lines.slice(0, HEAD_LINES).some((line) => COPYRIGHT.test(line.raw))
			? []
			: [
					finding(
						1,
						"legal/copyright",
						5,
						'No copyright message found.  You should have a line: "Copyright [year] <Copyright Owner>"',
					),
				],
};
