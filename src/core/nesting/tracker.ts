// CHANGE: Brace/keyword driven scope tracker
// WHY: Checks need namespace/class/function context without a grammar
// PURITY: CORE (the tracker mutates only its own private state)
// INVARIANT: The scope stack never underflows; a stray `}` becomes an anomaly
// INVARIANT: For balanced input the stack is empty after the last line
// COMPLEXITY: O(n) tokens; O(depth) per published snapshot

import {
	type AccessMode,
	type CleansedLine,
	type ConditionalDirective,
	type ConditionalFrame,
	type Finding,
	finding,
	type NestingSnapshot,
	type NestingTrace,
	type ScopeFrame,
	type ScopeKind,
	type ScopeRecord,
} from "../types/index.js";
import { type Token, tokenize } from "./tokens.js";

type DeclKind = "namespace" | "class" | "struct" | "union" | "enum";

interface Frame {
	kind: ScopeKind;
	name: string | null;
	access: AccessMode | null;
	openedAt: number;
	bodyAt: number | null;
	depth: number;
	angleDepth: number;
	specialized: boolean;
}

interface PendingDecl {
	readonly kind: DeclKind;
	readonly line: number;
	name: string | null;
	naming: boolean;
	specialized: boolean;
}

interface Statement {
	pending: PendingDecl | null;
	functionName: string | null;
	functionLine: number;
	lastIdent: string | null;
	parenDepth: number;
	afterParams: boolean;
	initList: boolean;
	initBraces: number;
	sawAssign: boolean;
	operatorSeen: boolean;
	templateExpected: boolean;
	prev: Token | null;
}

interface OpenConditional {
	readonly directive: ConditionalDirective;
	readonly openedAt: number;
	readonly saved: Frame[];
	firstBranch: Frame[] | null;
	branch: number;
}

const CONTROL_KEYWORDS: ReadonlySet<string> = new Set([
	"if",
	"for",
	"while",
	"switch",
	"catch",
	"return",
	"sizeof",
	"alignof",
	"decltype",
	"static_assert",
	"new",
	"delete",
	"throw",
	"typeid",
	"noexcept",
	"defined",
	"case",
]);

const ATTRIBUTE_KEYWORDS: ReadonlySet<string> = new Set([
	"alignas",
	"__attribute__",
	"__declspec",
]);

const ACCESS_KEYWORDS: ReadonlySet<string> = new Set([
	"public",
	"protected",
	"private",
]);

const DECL_KEYWORDS: ReadonlySet<string> = new Set([
	"namespace",
	"class",
	"struct",
	"union",
	"enum",
]);

const CLASS_LIKE: ReadonlySet<ScopeKind> = new Set(["class", "struct", "union"]);

const CONDITIONAL_DIRECTIVE = /^\s*#\s*(ifdef|ifndef|if|elif|else|endif)\b/;

const freshStatement = (): Statement => ({
	pending: null,
	functionName: null,
	functionLine: 0,
	lastIdent: null,
	parenDepth: 0,
	afterParams: false,
	initList: false,
	initBraces: 0,
	sawAssign: false,
	operatorSeen: false,
	templateExpected: false,
	prev: null,
});

const cloneFrames = (frames: readonly Frame[]): Frame[] =>
	frames.map((frame) => ({ ...frame }));

const conditionalFrame = (c: OpenConditional): ConditionalFrame => ({
	kind: "conditional",
	directive: c.directive,
	openedAt: c.openedAt,
	branch: c.branch,
});

const freeze = (frame: Frame): ScopeFrame => ({ ...frame });

const isDeclKind = (value: string): value is DeclKind =>
	DECL_KEYWORDS.has(value);

const isAccessMode = (value: string): value is AccessMode =>
	ACCESS_KEYWORDS.has(value);

/**
 * Human description of a frame for anomaly messages.
 *
 * @pure true
 */
export function describeFrame(frame: ScopeFrame): string {
	return frame.name === null ? `anonymous ${frame.kind}` : `${frame.kind} ${frame.name}`;
}

/**
 * Incremental nesting state machine: one cleansed line in, one snapshot out.
 *
 * Declarations (`namespace`, `class`, `struct`, `union`, `enum`) are held as
 * pending until their opening brace; a `;`, `=` or `(` first discards them,
 * so forward declarations never push a frame. All braces move the depth of
 * the innermost frame; only named constructs and function bodies push.
 *
 * @invariant stack.length ≥ 0 at all times
 *
 * @example
 * ```ts
 * const tracker = new NestingTracker();
 * for (const line of cleansed.lines) tracker.feed(line);
 * const trace = tracker.finish();
 * ```
 */
export class NestingTracker {
	private stack: Frame[] = [];
	private readonly conditionals: OpenConditional[] = [];
	private readonly snapshots: NestingSnapshot[] = [];
	private readonly records: ScopeRecord[] = [];
	private readonly anomalies: Finding[] = [];
	private statement: Statement = freshStatement();
	private lineNumber = 0;

	/**
	 * Consume one line and return the nesting state at its start.
	 */
	feed(line: CleansedLine): NestingSnapshot {
		this.lineNumber = line.lineNumber;
		const snapshot: NestingSnapshot = {
			lineNumber: line.lineNumber,
			scopes: this.stack.map(freeze),
			conditionals: this.conditionals.map(conditionalFrame),
		};
		this.snapshots.push(snapshot);

		if (line.preprocessor) {
			this.directive(line.text);
			return snapshot;
		}

		for (const token of tokenize(line.text)) {
			this.token(token);
			this.statement.prev = token;
		}
		return snapshot;
	}

	/**
	 * Close the pass: report frames and conditionals left open.
	 */
	finish(): NestingTrace {
		const finalScopes = this.stack
			.filter((frame) => frame.kind !== "template")
			.map(freeze);
		for (const frame of finalScopes) {
			this.records.push({ frame, closedAt: null });
			this.anomalies.push(
				CLASS_LIKE.has(frame.kind)
					? finding(
							frame.openedAt,
							"build/class",
							5,
							`Failed to find complete declaration of ${frame.kind} ${frame.name ?? "(anonymous)"}`,
						)
					: finding(
							frame.openedAt,
							"readability/braces",
							4,
							`Could not find the closing brace of ${describeFrame(frame)}`,
						),
			);
		}
		const finalConditionals = this.conditionals.map(conditionalFrame);
		for (const conditional of finalConditionals) {
			this.anomalies.push(
				finding(
					conditional.openedAt,
					"build/endif",
					4,
					`Could not find #endif for #${conditional.directive}`,
				),
			);
		}
		return {
			snapshots: this.snapshots,
			records: this.records,
			finalScopes,
			finalConditionals,
			anomalies: this.anomalies,
		};
	}

	private top(): Frame | undefined {
		return this.stack[this.stack.length - 1];
	}

	private directive(text: string): void {
		const match = CONDITIONAL_DIRECTIVE.exec(text);
		const name = match?.[1];
		if (name === undefined) return;

		if (name === "if" || name === "ifdef" || name === "ifndef") {
			this.conditionals.push({
				directive: name,
				openedAt: this.lineNumber,
				saved: cloneFrames(this.stack),
				firstBranch: null,
				branch: 0,
			});
			return;
		}

		const open = this.conditionals[this.conditionals.length - 1];
		if (open === undefined) {
			this.anomalies.push(
				finding(
					this.lineNumber,
					"build/endif",
					4,
					`#${name} without matching #if`,
				),
			);
			return;
		}

		if (name === "endif") {
			this.conditionals.pop();
			if (open.firstBranch !== null) this.stack = open.firstBranch;
			return;
		}

		// #elif / #else: every branch starts from the state at #if
		if (open.firstBranch === null) open.firstBranch = cloneFrames(this.stack);
		open.branch += 1;
		this.stack = cloneFrames(open.saved);
	}

	private token(token: Token): void {
		const s = this.statement;
		if (token.kind === "literal" || token.kind === "number") return;

		const template = this.top();
		if (template?.kind === "template" && template.angleDepth > 0) {
			this.templateToken(template, token);
			return;
		}

		if (token.kind === "ident") {
			this.identifier(token.value);
			return;
		}

		switch (token.value) {
			case "(":
				this.openParen();
				return;
			case ")":
				s.parenDepth = Math.max(0, s.parenDepth - 1);
				if (s.parenDepth === 0 && s.functionName !== null) s.afterParams = true;
				return;
			case ":":
				this.colon();
				return;
			case "=":
				if (s.parenDepth === 0 && !s.operatorSeen) {
					s.sawAssign = true;
					s.pending = null;
				}
				return;
			case "<":
				// `struct hash<Foo>` names `hash`
				if (s.pending !== null) {
					if (s.pending.naming && s.pending.name !== null) s.pending.specialized = true;
					s.pending.naming = false;
				}
				if (s.templateExpected) {
					s.templateExpected = false;
					this.stack.push({
						kind: "template",
						name: null,
						access: null,
						openedAt: this.lineNumber,
						bodyAt: null,
						depth: 0,
						angleDepth: 1,
						specialized: false,
					});
				}
				return;
			case ";":
				if (s.parenDepth === 0) this.statement = freshStatement();
				return;
			case "{":
				this.openBrace();
				return;
			case "}":
				this.closeBrace();
				return;
			default:
				return;
		}
	}

	private templateToken(frame: Frame, token: Token): void {
		if (token.value === "<") {
			frame.angleDepth += 1;
		} else if (token.value === ">") {
			frame.angleDepth -= 1;
			if (frame.angleDepth === 0) this.stack.pop();
		} else if (token.value === ";" || token.value === "{" || token.value === "}") {
			// never closed: not a template header after all
			this.stack.pop();
			this.token(token);
		}
	}

	private identifier(value: string): void {
		const s = this.statement;
		const pending = s.pending;

		if (value === "template") {
			s.templateExpected = true;
			return;
		}
		if (value === "operator") s.operatorSeen = true;

		if (isDeclKind(value) && s.parenDepth === 0) {
			// `enum class` / `enum struct` stay an enum
			if (pending?.kind === "enum" && pending.name === null) return;
			s.pending = {
				kind: value,
				line: this.lineNumber,
				name: null,
				naming: true,
				specialized: false,
			};
			return;
		}

		if (pending !== null && pending.naming && value !== "final") {
			if (pending.kind === "namespace" && value === "inline") return;
			pending.name =
				pending.kind === "namespace" && s.prev?.value === "::" && pending.name !== null
					? `${pending.name}::${value}`
					: value;
		}
		if (s.parenDepth === 0) s.lastIdent = value;
	}

	private openParen(): void {
		const s = this.statement;
		const prev = s.prev;
		if (s.parenDepth === 0 && !(prev !== null && ATTRIBUTE_KEYWORDS.has(prev.value))) {
			if (s.pending !== null && s.pending.kind !== "namespace") s.pending = null;
			if (s.functionName === null && !s.sawAssign && !s.afterParams) {
				const candidate = this.functionCandidate(prev);
				if (candidate !== null) {
					s.functionName = candidate;
					s.functionLine = this.lineNumber;
				}
			}
		}
		s.parenDepth += 1;
	}

	private functionCandidate(prev: Token | null): string | null {
		const s = this.statement;
		if (prev?.kind === "ident" && !CONTROL_KEYWORDS.has(prev.value)) {
			return prev.value;
		}
		if (prev?.value === ">" && s.lastIdent !== null && !CONTROL_KEYWORDS.has(s.lastIdent)) {
			return s.lastIdent;
		}
		return s.operatorSeen ? "operator" : null;
	}

	private colon(): void {
		const s = this.statement;
		const prev = s.prev;
		const top = this.top();
		if (
			prev !== null &&
			isAccessMode(prev.value) &&
			top !== undefined &&
			CLASS_LIKE.has(top.kind) &&
			top.depth === 0
		) {
			top.access = prev.value;
			return;
		}
		if (s.pending !== null) {
			s.pending.naming = false;
			return;
		}
		if (s.afterParams && s.parenDepth === 0) s.initList = true;
	}

	private openBrace(): void {
		const s = this.statement;
		const prev = s.prev;
		if (s.initList && (prev?.kind === "ident" || prev?.value === ">")) {
			s.initBraces += 1;
			return;
		}

		const pending = s.pending;
		const insideFunction = this.stack.some((frame) => frame.kind === "function");
		const top = this.top();

		if (pending !== null) {
			this.stack.push({
				kind: pending.kind,
				name: pending.name,
				access: pending.kind === "class" ? "private" : CLASS_LIKE.has(pending.kind) ? "public" : null,
				openedAt: pending.line,
				bodyAt: this.lineNumber,
				depth: 0,
				angleDepth: 0,
				specialized: pending.specialized,
			});
		} else if (
			s.functionName !== null &&
			s.afterParams &&
			s.parenDepth === 0 &&
			!s.sawAssign &&
			!insideFunction
		) {
			this.stack.push({
				kind: "function",
				name: s.functionName,
				access: null,
				openedAt: s.functionLine,
				bodyAt: this.lineNumber,
				depth: 0,
				angleDepth: 0,
				specialized: false,
			});
		} else if (top !== undefined) {
			top.depth += 1;
			// braces inside an expression keep the statement going
			if (s.parenDepth > 0 || s.sawAssign) return;
		} else {
			this.stack.push({
				kind: "other",
				name: null,
				access: null,
				openedAt: this.lineNumber,
				bodyAt: this.lineNumber,
				depth: 0,
				angleDepth: 0,
				specialized: false,
			});
		}
		const parenDepth = s.parenDepth;
		this.statement = freshStatement();
		this.statement.parenDepth = parenDepth;
	}

	private closeBrace(): void {
		const s = this.statement;
		if (s.initBraces > 0) {
			s.initBraces -= 1;
			return;
		}

		const top = this.top();
		if (top === undefined) {
			this.anomalies.push(
				finding(this.lineNumber, "readability/braces", 4, "Unmatched closing brace"),
			);
		} else if (top.depth > 0) {
			top.depth -= 1;
			if (s.parenDepth > 0 || s.sawAssign) return;
		} else {
			this.stack.pop();
			this.records.push({ frame: freeze(top), closedAt: this.lineNumber });
		}
		const parenDepth = s.parenDepth;
		this.statement = freshStatement();
		this.statement.parenDepth = parenDepth;
	}
}

/**
 * Run a full nesting pass over cleansed lines.
 *
 * @pure true
 * @invariant result.snapshots.length === lines.length
 */
export function trackNesting(lines: readonly CleansedLine[]): NestingTrace {
	const tracker = new NestingTracker();
	for (const line of lines) tracker.feed(line);
	return tracker.finish();
}
