// CHANGE: Naming convention checks per construct kind
// WHY: Declarations are recognized heuristically, so naming findings carry medium-low confidence
// PURITY: CORE
// COMPLEXITY: O(n + r)

import { atNamespaceScope } from "../nesting/index.js";
import { type Finding, finding } from "../types/index.js";
import type { Checker, FileContext } from "./types.js";

const CAMEL_CASE = /^[A-Z][A-Za-z0-9]*$/;
const LOWER_SNAKE = /^[a-z][a-z0-9_]*$/;
const UPPER_SNAKE = /^[A-Z_][A-Z0-9_]*$/;
const K_CAMEL = /^k[A-Z][A-Za-z0-9]*$/;

const DEFINE = /^\s*#\s*define\s+(\w+)/;
const CONSTANT =
	/^\s*(?:(?:static|inline|extern)\s+)*(?:constexpr|const)\s+[\w:<>,*&\s]*?\b([A-Za-z_]\w*)\s*(?:=|\{|\[|;)/;

const TYPE_KINDS: ReadonlySet<string> = new Set(["class", "struct", "union", "enum"]);

function checkNaming(ctx: FileContext): readonly Finding[] {
	const findings: Finding[] = [];

	for (const { frame } of ctx.nesting.records) {
		if (frame.name === null) continue;
		// a specialization reuses the primary template's name
		if (TYPE_KINDS.has(frame.kind) && !frame.specialized && !CAMEL_CASE.test(frame.name)) {
			findings.push(
				finding(
					frame.openedAt,
					"readability/naming",
					3,
					`Type name "${frame.name}" should be CamelCase`,
				),
			);
		}
		if (frame.kind === "namespace" && !frame.name.split("::").every((part) => LOWER_SNAKE.test(part))) {
			findings.push(
				finding(
					frame.openedAt,
					"readability/naming",
					3,
					`Namespace name "${frame.name}" should be lower_snake_case`,
				),
			);
		}
	}

	for (const line of ctx.lines) {
		if (line.joined) continue;

		if (line.preprocessor) {
			const macro = DEFINE.exec(line.text)?.[1];
			if (macro !== undefined && !UPPER_SNAKE.test(macro)) {
				findings.push(
					finding(
						line.lineNumber,
						"readability/naming",
						2,
						`Macro name "${macro}" should be UPPER_SNAKE_CASE`,
					),
				);
			}
			continue;
		}

		const constant = CONSTANT.exec(line.text)?.[1];
		if (
			constant !== undefined &&
			!K_CAMEL.test(constant) &&
			atNamespaceScope(ctx.nesting, line.lineNumber)
		) {
			findings.push(
				finding(
					line.lineNumber,
					"readability/naming",
					2,
					`Constant name "${constant}" should be kCamelCase`,
				),
			);
		}
	}

	return findings.sort((a, b) => a.line - b.line);
}

export const namingChecker: Checker = {
	id: "naming",
	categories: ["readability/naming"],
	check: checkNaming,
};
