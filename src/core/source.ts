// CHANGE: Build immutable SourceFile values from already-read text
// WHY: The core never performs I/O; callers hand in content and an optional kind hint
// PURITY: CORE
// INVARIANT: createSourceFile(p, t).lines.join("\n") reproduces t without `\r` and the final terminator
// COMPLEXITY: O(n) where n = |text|

import type { FileKind, SourceFile } from "./types/index.js";

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Lower-cased extension of a path without the leading dot ("" when absent).
 *
 * @pure true
 */
export function extensionOf(path: string): string {
	const base = path.slice(path.lastIndexOf("/") + 1);
	const dot = base.lastIndexOf(".");
	return dot <= 0 ? "" : base.slice(dot + 1).toLowerCase();
}

/**
 * Decide header vs source by the configured extension sets.
 *
 * @pure true
 * @invariant hint !== undefined ⇒ result === hint
 */
export function detectFileKind(
	path: string,
	headerExtensions: readonly string[],
	hint?: FileKind,
): FileKind {
	if (hint !== undefined) return hint;
	return headerExtensions.includes(extensionOf(path)) ? "header" : "source";
}

/**
 * Split raw text into physical lines.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * createSourceFile("a.cc", "int x;\r\n", "source").lines; // ["int x;"]
 * ```
 */
export function createSourceFile(
	path: string,
	text: string,
	kind: FileKind,
): SourceFile {
	const content = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
	const endsWithNewline = content.endsWith("\n");
	const body = endsWithNewline ? content.slice(0, -1) : content;
	const lines =
		content.length === 0
			? []
			: body.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
	return { path, lines, endsWithNewline, kind };
}
