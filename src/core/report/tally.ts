// CHANGE: Error tallies per category key, per file and overall
// WHY: Per-file tallies are computed independently and merged, so files can be analyzed in parallel
// PURITY: CORE
// INVARIANT: total === Σ byFile values
// INVARIANT: mergeTallies is associative with EMPTY_TALLY as identity
// COMPLEXITY: O(k) per update where k = distinct keys

import { match } from "ts-pattern";

import type { CountingMode, Diagnostic } from "../types/index.js";

export interface Tally {
	readonly total: number;
	readonly byCategory: Readonly<Record<string, number>>;
	readonly byFile: Readonly<Record<string, number>>;
}

export const EMPTY_TALLY: Tally = { total: 0, byCategory: {}, byFile: {} };

/**
 * Key a category is counted under, or `null` when only the total is kept.
 *
 * @pure true
 */
export const countingKey = (mode: CountingMode, category: string): string | null =>
	match(mode)
		.with("total", () => null)
		.with("toplevel", () => category.split("/")[0] ?? category)
		.with("detailed", () => category)
		.exhaustive();

const bump = (
	counts: Readonly<Record<string, number>>,
	key: string,
	by = 1,
): Readonly<Record<string, number>> => ({ ...counts, [key]: (counts[key] ?? 0) + by });

/**
 * Count one reported diagnostic.
 *
 * @pure true
 */
export function recordDiagnostic(
	tally: Tally,
	mode: CountingMode,
	diagnostic: Diagnostic,
): Tally {
	const key = countingKey(mode, diagnostic.category);
	return {
		total: tally.total + 1,
		byCategory: key === null ? tally.byCategory : bump(tally.byCategory, key),
		byFile: bump(tally.byFile, diagnostic.file),
	};
}

/**
 * Tally a whole list of diagnostics.
 *
 * @pure true
 */
export const tallyDiagnostics = (
	diagnostics: readonly Diagnostic[],
	mode: CountingMode,
): Tally =>
	diagnostics.reduce<Tally>((tally, d) => recordDiagnostic(tally, mode, d), EMPTY_TALLY);

/**
 * @pure true
 */
export function mergeTallies(a: Tally, b: Tally): Tally {
	const byCategory = Object.entries(b.byCategory).reduce(
		(counts, [key, n]) => bump(counts, key, n),
		a.byCategory,
	);
	const byFile = Object.entries(b.byFile).reduce(
		(counts, [key, n]) => bump(counts, key, n),
		a.byFile,
	);
	return { total: a.total + b.total, byCategory, byFile };
}
