// CHANGE: Checker contract and the per-file context it reads
// WHY: Every rule is an independent function of one immutable context
// PURITY: CORE
// INVARIANT: A checker never mutates the context it is given
// COMPLEXITY: O(1)

import type {
	CleansedLine,
	Finding,
	LintConfig,
	LogicalLine,
	NestingTrace,
	SourceFile,
} from "../types/index.js";

/**
 * An `#include` directive found in the file.
 *
 * @property quoted `"x.h"` (true) vs `<x.h>` (false)
 */
export interface IncludeDirective {
	readonly line: number;
	readonly path: string;
	readonly quoted: boolean;
}

/**
 * Read-only view of one file handed to every checker.
 */
export interface FileContext {
	readonly source: SourceFile;
	readonly lines: readonly CleansedLine[];
	readonly logical: readonly LogicalLine[];
	readonly nesting: NestingTrace;
	readonly includes: readonly IncludeDirective[];
	readonly config: LintConfig;
}

/**
 * One rule family.
 *
 * @property categories Every category this checker can emit
 */
export interface Checker {
	readonly id: string;
	readonly categories: readonly string[];
	readonly check: (ctx: FileContext) => readonly Finding[];
}
