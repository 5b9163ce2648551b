// CHANGE: Namespace usage and termination-comment checks
// WHY: Long namespaces are closed far from their head; the closing comment names them
// PURITY: CORE
// INVARIANT: Termination is only checked for namespaces spanning at least 10 lines
// COMPLEXITY: O(n + r) where r = closed scope records

import { type Finding, finding } from "../types/index.js";
import type { Checker, FileContext } from "./types.js";

const USING_DIRECTIVE = /\busing\s+namespace\s+([\w:]+)/;
const LITERALS = /\bliterals\b/;
const MIN_COMMENTED_SPAN = 10;

const escapeRegExp = (value: string): string =>
	value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Whether a raw closing line carries the expected `// namespace name` comment.
 *
 * @pure true
 */
export function isTerminationComment(raw: string, name: string | null): boolean {
	const tail = name === null ? "" : `\\s+${escapeRegExp(name)}`;
	return new RegExp(`^\\s*\\};*\\s*(?://|/\\*).*\\bnamespace${tail}[*/.\\\\\\s]*$`).test(raw);
}

function checkNamespaces(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];

	for (const line of ctx.lines) {
		const using = USING_DIRECTIVE.exec(line.text);
		if (using !== null && !LITERALS.test(using[1] ?? "")) {
			findings.push(
				finding(
					line.lineNumber,
					"build/namespaces",
					5,
					"Do not use namespace using-directives.  Use using-declarations instead.",
				),
			);
		}
	}

	for (const record of ctx.nesting.records) {
		const frame = record.frame;
		if (frame.kind !== "namespace") continue;

		if (frame.name === null && ctx.source.kind === "header") {
			findings.push(
				finding(
					frame.openedAt,
					"build/namespaces",
					4,
					"Do not use unnamed namespaces in header files.",
				),
			);
		}

		if (record.closedAt === null || record.closedAt - frame.openedAt < MIN_COMMENTED_SPAN) {
			continue;
		}
		const closing = ctx.lines[record.closedAt - 1];
		if (closing === undefined || isTerminationComment(closing.raw, frame.name)) continue;
		findings.push(
			finding(
				record.closedAt,
				"readability/namespace",
				5,
				frame.name === null
					? 'Anonymous namespace should be terminated with "// namespace"'
					: `Namespace should be terminated with "// namespace ${frame.name}"`,
			),
		);
	}

	return findings;
}

export const namespaceChecker: Checker = {
	id: "namespaces",
	categories: ["build/namespaces", "readability/namespace"],
	check: checkNamespaces,
};
