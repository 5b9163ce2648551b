// CHANGE: Minimal tokenizer over cleansed text
// WHY: The nesting tracker reasons about identifiers and punctuation only; literals are already neutralized
// PURITY: CORE
// INVARIANT: Identifiers never start inside a literal (literals tokenize as one "literal" token)
// COMPLEXITY: O(n) per line

export type TokenKind = "ident" | "number" | "literal" | "punct";

export interface Token {
	readonly kind: TokenKind;
	readonly value: string;
}

const TOKEN =
	/([A-Za-z_]\w*)|([0-9][\w.']*)|("[^"]*"|'[^']*')|(::|->|\S)/g;

/**
 * Split a cleansed line into tokens.
 *
 * @pure true
 *
 * @example
 * ```ts
 * tokenize("a::b(1'000);").map((t) => t.value);
 * // ["a", "::", "b", "(", "1'000", ")", ";"]
 * ```
 */
export function tokenize(text: string): readonly Token[] {
	const tokens: Token[] = [];
	for (const match of text.matchAll(TOKEN)) {
		if (match[1] !== undefined) {
			tokens.push({ kind: "ident", value: match[1] });
		} else if (match[2] !== undefined) {
			tokens.push({ kind: "number", value: match[2] });
		} else if (match[3] !== undefined) {
			tokens.push({ kind: "literal", value: match[3] });
		} else {
			tokens.push({ kind: "punct", value: match[0] });
		}
	}
	return tokens;
}
