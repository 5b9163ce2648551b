// CHANGE: Header include-guard check
// WHY: Every header must protect itself against double inclusion with a path-derived macro
// PURITY: CORE
// INVARIANT: At most one missing/wrong-guard finding per file
// COMPLEXITY: O(n)

import { type Finding, finding } from "../types/index.js";
import type { Checker, FileContext } from "./types.js";

const IFNDEF = /^\s*#\s*ifndef\s+(\w+)/;
const DEFINE = /^\s*#\s*define\s+(\w+)/;
const ENDIF = /^\s*#\s*endif\b/;
const PRAGMA_ONCE = /^\s*#\s*pragma\s+once\b/;

/**
 * Guard macro expected for a header path.
 *
 * @pure true
 *
 * @example
 * ```ts
 * guardName("./src/net/socket.h"); // "SRC_NET_SOCKET_H_"
 * ```
 */
export function guardName(path: string): string {
	const normalized = path.replace(/\\/g, "/").replace(/^(?:\.\/|\/)+/, "");
	return `${normalized.replace(/[^A-Za-z0-9]/g, "_").toUpperCase()}_`;
}

interface Directive {
	readonly line: number;
	readonly name: string;
}

const firstMatch = (
	ctx: FileContext,
	pattern: RegExp,
	after = 0,
): Directive | undefined => {
	for (const line of ctx.lines) {
		if (line.lineNumber <= after || !line.preprocessor) continue;
		const name = pattern.exec(line.text)?.[1];
		if (name !== undefined) return { line: line.lineNumber, name };
	}
	return undefined;
};

function checkHeaderGuard(ctx: FileContext): readonly Finding[] {
	if (ctx.source.kind !== "header") return [];
	if (ctx.lines.some((line) => PRAGMA_ONCE.test(line.text))) return [];

	const expected = guardName(ctx.source.path);
	const ifndef = firstMatch(ctx, IFNDEF);
	const define = ifndef === undefined ? undefined : firstMatch(ctx, DEFINE, ifndef.line);

	if (ifndef === undefined || define === undefined || define.name !== ifndef.name) {
		return [
			finding(
				1,
				"build/header_guard",
				5,
				`No #ifndef header guard found, suggested CPP variable is: ${expected}`,
			),
		];
	}

	if (ifndef.name !== expected) {
		return [
			finding(
				ifndef.line,
				"build/header_guard",
				5,
				`#ifndef header guard has wrong style, please use: ${expected}`,
			),
		];
	}

	const endif = [...ctx.lines].reverse().find((line) => ENDIF.test(line.text));
	const commented = new RegExp(`^\\s*#\\s*endif\\s*(?://|/\\*)\\s*${expected}\\b`);
	if (endif !== undefined && !commented.test(endif.raw)) {
		return [
			finding(
				endif.lineNumber,
				"build/header_guard",
				0,
				`#endif line should be "#endif  // ${expected}"`,
			),
		];
	}
	return [];
}

export const headerGuardChecker: Checker = {
	id: "header-guard",
	categories: ["build/header_guard"],
	check: checkHeaderGuard,
};
