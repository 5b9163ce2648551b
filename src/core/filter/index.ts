// CHANGE: Diagnostic filter combining confidence threshold, category rules and line markers
// WHY: A single predicate decides whether a finding reaches the report
// PURITY: CORE
// INVARIANT: shouldEmit never consults global state; the filter value carries everything
// COMPLEXITY: O(r + p) per finding

import type { Finding, FilterRule } from "../types/index.js";
import { isCategoryEnabled } from "./rules.js";
import { isSuppressed, type SuppressionIndex } from "./suppression.js";

export {
	DEFAULT_FILTERS,
	isCategoryEnabled,
	parseFilterEntry,
	parseFilters,
} from "./rules.js";
export {
	buildSuppressionIndex,
	isSuppressed,
	type SuppressionIndex,
	type SuppressionScan,
} from "./suppression.js";

/**
 * Everything needed to decide on one file's findings.
 *
 * @property rules Defaults followed by configured rules, in application order
 */
export interface DiagnosticFilter {
	readonly rules: readonly FilterRule[];
	readonly minConfidence: number;
	readonly suppressions: SuppressionIndex;
}

/**
 * Whether a finding is reported.
 *
 * @pure true
 * @invariant shouldEmit(f, d) ⇒ d.confidence ≥ f.minConfidence
 */
export const shouldEmit = (filter: DiagnosticFilter, diagnostic: Finding): boolean =>
	diagnostic.confidence >= filter.minConfidence &&
	isCategoryEnabled(filter.rules, diagnostic.category) &&
	!isSuppressed(filter.suppressions, diagnostic.line, diagnostic.category);
