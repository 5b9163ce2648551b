// CHANGE: Assemble the FileContext from the cleanser and nesting outputs
// WHY: Include extraction is shared by several checkers
// PURITY: CORE
// INVARIANT: includes are listed in line order
// COMPLEXITY: O(n)

import type { CleansedSource } from "../cleanse/index.js";
import type { LintConfig, NestingTrace } from "../types/index.js";
import type { FileContext, IncludeDirective } from "./types.js";

// the cleansed text has the quoted path replaced, so the raw line is read
const INCLUDE = /^\s*#\s*include\s*(["<])([^">]*)[">]/;

/**
 * Collect `#include` directives.
 *
 * @pure true
 */
export function collectIncludes(
	cleansed: CleansedSource,
): readonly IncludeDirective[] {
	const includes: IncludeDirective[] = [];
	for (const line of cleansed.lines) {
		if (!line.preprocessor || line.joined) continue;
		const match = INCLUDE.exec(line.raw);
		if (match?.[2] === undefined) continue;
		includes.push({
			line: line.lineNumber,
			path: match[2],
			quoted: match[1] === '"',
		});
	}
	return includes;
}

/**
 * @pure true
 */
export const buildContext = (
	cleansed: CleansedSource,
	nesting: NestingTrace,
	config: LintConfig,
): FileContext => ({
	source: cleansed.file,
	lines: cleansed.lines,
	logical: cleansed.logical,
	nesting,
	includes: collectIncludes(cleansed),
	config,
});
