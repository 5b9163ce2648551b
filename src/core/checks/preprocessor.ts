// CHANGE: Preprocessor directive hygiene
// PURITY: CORE
// COMPLEXITY: O(n)

import { finding } from "../types/index.js";
import type { Checker } from "./types.js";

// comments are already blanked in the cleansed text
const ENDIF_WITH_TEXT = /^\s*#\s*endif\s*[^/\s]+/;

export const preprocessorChecker: Checker = {
	id: "preprocessor",
	categories: ["build/endif_comment"],
	check: (ctx) =>
		ctx.lines
			.filter((line) => line.preprocessor && ENDIF_WITH_TEXT.test(line.text))
			.map((line) =>
				finding(
					line.lineNumber,
					"build/endif_comment",
					5,
					"Uncommented text after #endif is non-standard.  Use a comment.",
				),
			),
};
