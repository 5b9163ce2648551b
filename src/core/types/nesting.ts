// CHANGE: Scope-stack models for the nesting tracker
// WHY: Checks need to know, at any line, which named constructs enclose it
// PURITY: CORE
// INVARIANT: Snapshots are copies; mutating the tracker never changes a published snapshot
// COMPLEXITY: O(1)

import type { Finding } from "./diagnostic.js";

export type ScopeKind =
	| "namespace"
	| "class"
	| "struct"
	| "union"
	| "enum"
	| "template"
	| "function"
	| "other";

export type AccessMode = "public" | "protected" | "private";

/**
 * One entry of the scope stack.
 *
 * @property openedAt Line where the construct's keyword or head was seen
 * @property bodyAt Line holding the opening brace (absent for `template` frames)
 * @property depth Anonymous braces currently open inside this frame
 * @property angleDepth Open `<` of a template parameter list (template frames only)
 * @property specialized The name was followed by template arguments (`struct hash<Foo>`)
 */
export interface ScopeFrame {
	readonly kind: ScopeKind;
	readonly name: string | null;
	readonly access: AccessMode | null;
	readonly openedAt: number;
	readonly bodyAt: number | null;
	readonly depth: number;
	readonly angleDepth: number;
	readonly specialized: boolean;
}

export type ConditionalDirective = "if" | "ifdef" | "ifndef";

/**
 * A preprocessor conditional region that is open at some line.
 *
 * @property branch 0 for the `#if` group, +1 for each `#elif`/`#else` seen so far
 */
export interface ConditionalFrame {
	readonly kind: "conditional";
	readonly directive: ConditionalDirective;
	readonly openedAt: number;
	readonly branch: number;
}

/**
 * Nesting state at the start of a physical line.
 */
export interface NestingSnapshot {
	readonly lineNumber: number;
	readonly scopes: readonly ScopeFrame[];
	readonly conditionals: readonly ConditionalFrame[];
}

/**
 * A braced construct and the span it covered.
 *
 * @invariant closedAt === null ⇔ the frame was still open at end of file
 */
export interface ScopeRecord {
	readonly frame: ScopeFrame;
	readonly closedAt: number | null;
}

/**
 * Result of a full nesting pass over a file.
 *
 * @invariant snapshots.length === number of lines fed
 */
export interface NestingTrace {
	readonly snapshots: readonly NestingSnapshot[];
	readonly records: readonly ScopeRecord[];
	readonly finalScopes: readonly ScopeFrame[];
	readonly finalConditionals: readonly ConditionalFrame[];
	readonly anomalies: readonly Finding[];
}
