// CHANGE: Line-oriented diagnostic renderers
// WHY: Each output format has a fixed field grammar consumed by editors and scripts
// PURITY: CORE
// INVARIANT: One diagnostic renders to exactly one line
// COMPLEXITY: O(|message|)

import { match } from "ts-pattern";

import type { Diagnostic, OutputFormat } from "../types/index.js";

/**
 * sed expressions that fix a finding in place, keyed by message.
 */
export const SED_FIXUPS: Readonly<Record<string, string>> = {
	"Line ends in whitespace.  Consider deleting these extra spaces.": "s/\\s*$//",
	"Missing space after ,": "s/,\\([^ ]\\)/, \\1/g",
	"Missing space before ( in for(": "s/for(/for (/",
	"Missing space before ( in if(": "s/if(/if (/",
	"Missing space before ( in switch(": "s/switch(/switch (/",
	"Missing space before ( in while(": "s/while(/while (/",
	"Missing space before {": "s/\\([^ ]\\){/\\1 {/",
	"Should have a space between // and comment": "s/\\/\\//\\/\\/ /",
	"Tab found; better to use spaces": "s/\\t/  /g",
	"You don't need a ; after a }": "s/};/}/",
};

const tail = (d: Diagnostic): string => `[${d.category}] [${d.confidence}]`;

function scripted(tool: "sed" | "gsed", d: Diagnostic): string {
	const fixup = SED_FIXUPS[d.message];
	return fixup === undefined
		? `# ${d.file}:${d.line}:  "${d.message}"  ${tail(d)}`
		: `${tool} -i '${d.line}${fixup}' ${d.file} # ${d.message}  ${tail(d)}`;
}

/**
 * Render one diagnostic in a line-oriented format.
 *
 * `junit` is a whole-run document; per diagnostic it falls back to the
 * default layout (see `renderJUnit`).
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatDiagnostic("emacs", { file: "a.cc", line: 3, category: "whitespace/tab", confidence: 1, message: "Tab found; better to use spaces" });
 * // "a.cc:3:  Tab found; better to use spaces  [whitespace/tab] [1]"
 * ```
 */
export const formatDiagnostic = (format: OutputFormat, d: Diagnostic): string =>
	match(format)
		.with("emacs", "junit", () => `${d.file}:${d.line}:  ${d.message}  ${tail(d)}`)
		.with("vs7", () => `${d.file}(${d.line}): error cxxstyle: [${d.category}] ${d.message} [${d.confidence}]`)
		.with("eclipse", () => `${d.file}:${d.line}: warning: ${d.message}  ${tail(d)}`)
		.with("sed", "gsed", (tool) => scripted(tool, d))
		.exhaustive();
