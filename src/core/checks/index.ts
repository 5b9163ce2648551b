// CHANGE: Checker registry and the catalogue of every category the pipeline can emit
// WHY: Config validation needs the full category list before any file is read
// PURITY: CORE
// INVARIANT: KNOWN_CATEGORIES is sorted and duplicate-free
// COMPLEXITY: O(c log c) once at module load

import { braceChecker } from "./braces.js";
import { constructChecker } from "./constructs.js";
import { copyrightChecker } from "./copyright.js";
import { functionLengthChecker } from "./functions.js";
import { headerGuardChecker } from "./header-guard.js";
import { includeChecker } from "./includes.js";
import { lineFormatChecker } from "./length.js";
import { loopConditionChecker } from "./loops.js";
import { namespaceChecker } from "./namespaces.js";
import { namingChecker } from "./naming.js";
import { operatorChecker } from "./operators.js";
import { preprocessorChecker } from "./preprocessor.js";
import type { Checker } from "./types.js";
import { spacingChecker } from "./whitespace.js";

export { buildContext, collectIncludes } from "./context.js";
export { closeExpression, type ExpressionEnd } from "./expression.js";
export type { Checker, FileContext, IncludeDirective } from "./types.js";

export const CHECKERS: readonly Checker[] = [
	lineFormatChecker,
	spacingChecker,
	braceChecker,
	operatorChecker,
	headerGuardChecker,
	includeChecker,
	copyrightChecker,
	namespaceChecker,
	namingChecker,
	constructChecker,
	loopConditionChecker,
	functionLengthChecker,
	preprocessorChecker,
];

/**
 * Category for a file whose pass could not complete; never filtered.
 */
export const UNPROCESSABLE_CATEGORY = "build/unprocessable";

/**
 * Categories emitted by the cleanser, the nesting tracker and suppression parsing.
 */
export const STRUCTURAL_CATEGORIES: readonly string[] = [
	"build/class",
	"build/endif",
	"readability/braces",
	"readability/multiline_comment",
	"readability/multiline_string",
	"readability/nolint",
];

export const KNOWN_CATEGORIES: readonly string[] = [
	...new Set([
		...CHECKERS.flatMap((checker) => checker.categories),
		...STRUCTURAL_CATEGORIES,
		UNPROCESSABLE_CATEGORY,
	]),
].sort();
