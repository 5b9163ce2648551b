// CHANGE: Indentation, blank-line and comment spacing checks
// WHY: Layout rules that depend on the enclosing scope kind
// PURITY: CORE
// INVARIANT: Blank lines directly inside a namespace or extern block are never flagged
// COMPLEXITY: O(n) over the lines of the file

import { enclosingClass, innermostFrame } from "../nesting/index.js";
import { isBlank, leadingSpaces } from "../text/column.js";
import {
	type CleansedLine,
	type CommentSegment,
	type Finding,
	finding,
} from "../types/index.js";
import type { Checker, FileContext } from "./types.js";

const ACCESS_LABEL = /^(\s*)(public|protected|private)\s*:(?!:)/;
const ACCESS_ONLY = /^\s*(public|protected|private)\s*:\s*$/;
const LABEL = /^\s*\w+\s*:(?!:)\s*\\?$/;
const CONTINUES_EXPRESSION = /[",=><] *$/;
const TODO = /^(\s*)TODO(\(.+?\))?:?(\s|$)?/;
const MISSING_SPACE = /^[^ ]*\w/;
const DOC_COMMENT = /^[/!](\s+|$)/;
const BRACE_BEFORE_COMMENT = /\{ *$/;

function checkIndent(ctx: FileContext, line: CleansedLine, prev: CleansedLine | undefined): Finding[] {
	const findings: Finding[] = [];
	const access = ACCESS_LABEL.exec(line.text);
	if (access !== null) {
		const frame = enclosingClass(ctx.nesting, line.lineNumber);
		const head = frame === undefined ? undefined : ctx.lines[frame.openedAt - 1];
		const indent = access[1] ?? "";
		if (frame !== undefined && head !== undefined && /^ *$/.test(indent)) {
			const expected = leadingSpaces(head.raw) + 1;
			if (indent.length !== expected) {
				findings.push(
					finding(
						line.lineNumber,
						"whitespace/indent",
						3,
						`${access[2] ?? ""}: should be indented +1 space inside ${frame.kind} ${frame.name ?? ""}`.trimEnd(),
					),
				);
			}
		}
		return findings;
	}

	const spaces = leadingSpaces(line.raw);
	if (
		(spaces === 1 || spaces === 3) &&
		!LABEL.test(line.text) &&
		!(prev !== undefined && CONTINUES_EXPRESSION.test(prev.text))
	) {
		findings.push(
			finding(
				line.lineNumber,
				"whitespace/indent",
				3,
				"Weird number of spaces at line-start.  Are you using a 2-space indent?",
			),
		);
	}
	return findings;
}

function checkBlankLine(ctx: FileContext, index: number): Finding[] {
	const line = ctx.lines[index];
	if (line === undefined || !isBlank(line.raw)) return [];

	const prev = ctx.lines[index - 1];
	if (prev !== undefined && ACCESS_ONLY.test(prev.text)) {
		const label = ACCESS_ONLY.exec(prev.text)?.[1] ?? "";
		return [
			finding(
				line.lineNumber,
				"whitespace/blank_line",
				3,
				`Do not leave a blank line after "${label}:"`,
			),
		];
	}

	const top = innermostFrame(ctx.nesting, line.lineNumber);
	if (top !== undefined && top.depth === 0 && (top.kind === "namespace" || top.kind === "other")) {
		return [];
	}

	const findings: Finding[] = [];
	if (prev !== undefined && prev.text.trimEnd().endsWith("{")) {
		findings.push(
			finding(
				line.lineNumber,
				"whitespace/blank_line",
				2,
				"Redundant blank line at the start of a code block should be deleted.",
			),
		);
	}
	const next = ctx.lines[index + 1];
	if (next !== undefined && /^\s*\}/.test(next.text) && !next.text.includes("} else ")) {
		findings.push(
			finding(
				line.lineNumber,
				"whitespace/blank_line",
				3,
				"Redundant blank line at the end of a code block should be deleted.",
			),
		);
	}
	return findings;
}

function checkTodo(lineNumber: number, text: string): Finding[] {
	const todo = TODO.exec(text);
	if (todo === null) return [];
	const findings: Finding[] = [];
	if ((todo[1] ?? "").length > 1) {
		findings.push(finding(lineNumber, "whitespace/todo", 2, "Too many spaces before TODO"));
	}
	if (todo[2] === undefined) {
		findings.push(
			finding(
				lineNumber,
				"readability/todo",
				2,
				'Missing username in TODO; it should look like "// TODO(my_username): Stuff."',
			),
		);
	}
	const middle = todo[3];
	if (middle !== " " && middle !== "") {
		findings.push(
			finding(
				lineNumber,
				"whitespace/todo",
				2,
				"TODO(my_username) should be followed by a space",
			),
		);
	}
	return findings;
}

function checkComment(
	line: CleansedLine,
	next: CleansedLine | undefined,
	segment: CommentSegment,
): Finding[] {
	const findings: Finding[] = [];
	const column = segment.column;
	const code = line.text.slice(0, column);

	if (!isBlank(code)) {
		const aligned =
			BRACE_BEFORE_COMMENT.test(code) &&
			next !== undefined &&
			leadingSpaces(next.raw) === column;
		const tight =
			(column >= 1 && !/\s/.test(line.raw.charAt(column - 1))) ||
			(column >= 2 && !/\s/.test(line.raw.charAt(column - 2)));
		if (!aligned && tight) {
			findings.push(
				finding(
					line.lineNumber,
					"whitespace/comments",
					2,
					"At least two spaces is best between code and comments",
				),
			);
		}
	}

	findings.push(...checkTodo(line.lineNumber, segment.text));

	if (MISSING_SPACE.test(segment.text) && !DOC_COMMENT.test(segment.text)) {
		findings.push(
			finding(
				line.lineNumber,
				"whitespace/comments",
				4,
				"Should have a space between // and comment",
			),
		);
	}
	return findings;
}

function checkSpacing(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];
	ctx.lines.forEach((line, index) => {
		const prev = ctx.lines[index - 1];
		const next = ctx.lines[index + 1];

		for (const segment of line.comments) {
			if (segment.style === "line") findings.push(...checkComment(line, next, segment));
		}
		findings.push(...checkBlankLine(ctx, index));
		if (!line.joined && !line.preprocessor && !isBlank(line.text)) {
			findings.push(...checkIndent(ctx, line, prev));
		}
	});
	return findings;
}

export const spacingChecker: Checker = {
	id: "spacing",
	categories: [
		"readability/todo",
		"whitespace/blank_line",
		"whitespace/comments",
		"whitespace/indent",
		"whitespace/todo",
	],
	check: checkSpacing,
};
