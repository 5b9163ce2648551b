// CHANGE: Nesting queries used by the rule checks
// WHY: Checks ask "what encloses line N" instead of re-walking braces
// PURITY: CORE
// INVARIANT: Queries never mutate the trace
// COMPLEXITY: O(depth) per query

import type {
	NestingSnapshot,
	NestingTrace,
	ScopeFrame,
	ScopeKind,
} from "../types/index.js";

export { describeFrame, NestingTracker, trackNesting } from "./tracker.js";
export { type Token, tokenize } from "./tokens.js";

const EMPTY: NestingSnapshot = { lineNumber: 0, scopes: [], conditionals: [] };

/**
 * Snapshot taken at the start of a 1-based line.
 *
 * @pure true
 */
export function snapshotAt(trace: NestingTrace, line: number): NestingSnapshot {
	return trace.snapshots[line - 1] ?? EMPTY;
}

/**
 * Innermost frame open at the start of `line`, if any.
 *
 * @pure true
 */
export function innermostFrame(
	trace: NestingTrace,
	line: number,
): ScopeFrame | undefined {
	const scopes = snapshotAt(trace, line).scopes;
	return scopes[scopes.length - 1];
}

const CLASS_KINDS: ReadonlySet<ScopeKind> = new Set(["class", "struct", "union"]);

/**
 * Class, struct or union whose body directly holds `line`.
 *
 * @pure true
 */
export function enclosingClass(
	trace: NestingTrace,
	line: number,
): ScopeFrame | undefined {
	const top = innermostFrame(trace, line);
	return top !== undefined && CLASS_KINDS.has(top.kind) && top.depth === 0
		? top
		: undefined;
}

/**
 * Whether `line` starts inside a function body.
 *
 * @pure true
 */
export function inFunction(trace: NestingTrace, line: number): boolean {
	return snapshotAt(trace, line).scopes.some((frame) => frame.kind === "function");
}

/**
 * Whether `line` starts at namespace scope (file scope or directly in a namespace).
 *
 * @pure true
 */
export function atNamespaceScope(trace: NestingTrace, line: number): boolean {
	const top = innermostFrame(trace, line);
	return top === undefined || (top.kind === "namespace" && top.depth === 0);
}
