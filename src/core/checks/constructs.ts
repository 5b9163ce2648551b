// CHANGE: Discouraged construct usage (C integer types, unsafe string functions, implicit constructors, copy-disabling macros)
// WHY: These are lexical patterns that need at most the enclosing class frame
// PURITY: CORE
// INVARIANT: Copy and move constructors are never asked to be explicit
// COMPLEXITY: O(n) plus one bracket match per constructor candidate

import { enclosingClass } from "../nesting/index.js";
import { type Finding, finding } from "../types/index.js";
import { closeExpression, expressionText } from "./expression.js";
import type { Checker, FileContext } from "./types.js";

const SHORT_PORT = /\bshort port\b/;
const UNSIGNED_SHORT_PORT = /\bunsigned short port\b/;
const C_INTEGER = /\b(short|long(?! +double)|long long)\b/;
const SPRINTF = /\bsprintf\s*\(/;
const UNSAFE_COPY = /\b(strcpy|strcat)\s*\(/;
const SNPRINTF_LITERAL_SIZE = /\bsnprintf\s*\(([^,]*),\s*([0-9]*)\s*,/;
const DISALLOW_MACRO =
	/^\s*(DISALLOW_COPY_AND_ASSIGN|DISALLOW_IMPLICIT_CONSTRUCTORS|DISALLOW_EVIL_CONSTRUCTORS)\s*\(/;

const escapeRegExp = (value: string): string =>
	value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Split a parameter list on top-level commas.
 *
 * @pure true
 *
 * @example
 * ```ts
 * splitParameters("std::map<int, int> m, int n = 0"); // ["std::map<int, int> m", "int n = 0"]
 * ```
 */
export function splitParameters(list: string): readonly string[] {
	const parts: string[] = [];
	let depth = 0;
	let current = "";
	for (const ch of list) {
		if (ch === "(" || ch === "<" || ch === "[" || ch === "{") depth += 1;
		else if (ch === ")" || ch === ">" || ch === "]" || ch === "}") depth = Math.max(0, depth - 1);
		if (ch === "," && depth === 0) {
			parts.push(current.trim());
			current = "";
		} else {
			current += ch;
		}
	}
	if (current.trim().length > 0) parts.push(current.trim());
	return parts;
}

/**
 * Whether a constructor parameter list makes it callable with one argument.
 *
 * @pure true
 */
export function isSingleArgument(parameters: readonly string[], className: string): boolean {
	const [first, ...rest] = parameters;
	if (first === undefined || first === "void" || first.includes("...")) return false;
	if (!rest.every((parameter) => parameter.includes("="))) return false;
	const selfReference = new RegExp(
		`^(?:const\\s+)?${escapeRegExp(className)}\\s*(?:<[^>]*>)?\\s*&`,
	);
	return !selfReference.test(first) && !/\binitializer_list\b/.test(first);
}

function checkExplicit(ctx: FileContext): Finding[] {
	const findings: Finding[] = [];
	const texts = ctx.lines.map((line) => line.text);

	for (const line of ctx.lines) {
		if (line.joined || line.preprocessor) continue;
		const frame = enclosingClass(ctx.nesting, line.lineNumber);
		if (frame === undefined || frame.name === null || frame.kind === "union") continue;

		const head = new RegExp(
			`^(\\s*)(explicit\\s+)?(?:(?:inline|constexpr)\\s+)*${escapeRegExp(frame.name)}\\s*\\(`,
		).exec(line.text);
		if (head === null || head[2] !== undefined) continue;

		const open = head[0].length - 1;
		const end = closeExpression(texts, line.lineNumber - 1, open);
		if (end === null) continue;
		const parameters = splitParameters(expressionText(texts, line.lineNumber - 1, open, end));
		if (isSingleArgument(parameters, frame.name)) {
			findings.push(
				finding(
					line.lineNumber,
					"runtime/explicit",
					5,
					"Single-parameter constructors should be marked explicit.",
				),
			);
		}
	}
	return findings;
}

function checkCopyMacros(ctx: FileContext): Finding[] {
	const findings: Finding[] = [];
	for (const line of ctx.lines) {
		const macro = DISALLOW_MACRO.exec(line.text)?.[1];
		if (macro === undefined) continue;
		const frame = enclosingClass(ctx.nesting, line.lineNumber);
		if (frame !== undefined && frame.access !== "private") {
			findings.push(
				finding(
					line.lineNumber,
					"readability/constructors",
					3,
					`${macro} must be in the private: section`,
				),
			);
		}
	}
	return findings;
}

function checkIntegers(ctx: FileContext): Finding[] {
	const findings: Finding[] = [];
	for (const line of ctx.lines) {
		if (line.preprocessor) continue;
		const { text, lineNumber } = line;

		if (SHORT_PORT.test(text)) {
			if (!UNSIGNED_SHORT_PORT.test(text)) {
				findings.push(
					finding(lineNumber, "runtime/int", 4, 'Use "unsigned short" for ports, not "short"'),
				);
			}
		} else {
			const integer = C_INTEGER.exec(text);
			if (integer !== null) {
				findings.push(
					finding(
						lineNumber,
						"runtime/int",
						4,
						`Use int16/int64/etc, rather than the C type ${integer[1] ?? ""}`,
					),
				);
			}
		}
	}
	return findings;
}

/**
 * String-function calls are matched per logical statement, so an argument
 * list broken across lines is still seen whole; findings anchor at the
 * statement's first line.
 */
function checkStringCalls(ctx: FileContext): Finding[] {
	const findings: Finding[] = [];
	for (const statement of ctx.logical) {
		if (ctx.lines[statement.start - 1]?.preprocessor !== false) continue;
		const { text, start: lineNumber } = statement;

		if (SPRINTF.test(text)) {
			findings.push(
				finding(lineNumber, "runtime/printf", 5, "Never use sprintf. Use snprintf instead."),
			);
		}
		const unsafe = UNSAFE_COPY.exec(text);
		if (unsafe !== null) {
			findings.push(
				finding(
					lineNumber,
					"runtime/printf",
					4,
					`Almost always, snprintf is better than ${unsafe[1] ?? ""}`,
				),
			);
		}
		const size = SNPRINTF_LITERAL_SIZE.exec(text);
		if (size !== null && size[2] !== undefined && size[2] !== "" && size[2] !== "0") {
			findings.push(
				finding(
					lineNumber,
					"runtime/printf",
					3,
					`If you can, use sizeof(${(size[1] ?? "").trim()}) instead of ${size[2]} as the 2nd arg to snprintf.`,
				),
			);
		}
	}
	return findings;
}

export const constructChecker: Checker = {
	id: "constructs",
	categories: [
		"readability/constructors",
		"runtime/explicit",
		"runtime/int",
		"runtime/printf",
	],
	check: (ctx) =>
		[
			...checkIntegers(ctx),
			...checkStringCalls(ctx),
			...checkExplicit(ctx),
			...checkCopyMacros(ctx),
		].sort((a, b) => a.line - b.line),
};
