// CHANGE: Bracket matching across cleansed lines
// WHY: Loop-condition and call checks need the extent of a parenthesized expression that may span lines
// PURITY: CORE
// INVARIANT: `<` is only a tentative opener; `)`, `]`, `}` or `;` discard pending `<`
// COMPLEXITY: O(k) where k = characters scanned until the match

type Opener = "(" | "[" | "{" | "<";

const CLOSER_OF: Readonly<Record<string, Opener>> = {
	")": "(",
	"]": "[",
	"}": "{",
};

const OPERATOR_BEFORE = /\boperator\s*$/;

/**
 * Position just past the closing bracket.
 *
 * @property index 0-based index into the line array
 * @property column 0-based column after the closer
 */
export interface ExpressionEnd {
	readonly index: number;
	readonly column: number;
}

type LineScan =
	| { readonly _tag: "Closed"; readonly column: number }
	| { readonly _tag: "Broken" }
	| { readonly _tag: "Open"; readonly stack: Opener[] };

const dropPendingAngles = (stack: Opener[]): void => {
	while (stack[stack.length - 1] === "<") stack.pop();
};

/**
 * Scan one line for the end of the expression whose openers are on `stack`.
 *
 * @pure true (the stack argument is owned by the caller's scan)
 */
function scanLine(line: string, start: number, stack: Opener[]): LineScan {
	for (let i = start; i < line.length; i += 1) {
		const ch = line.charAt(i);
		const before = line.charAt(i - 1);

		if (ch === "(" || ch === "[" || ch === "{") {
			stack.push(ch);
		} else if (ch === "<") {
			if (i > 0 && before === "<") {
				// `<<`: the previous `<` was a shift, not a template opener
				if (stack[stack.length - 1] === "<") {
					stack.pop();
					if (stack.length === 0) return { _tag: "Broken" };
				}
			} else if (!(i > 0 && OPERATOR_BEFORE.test(line.slice(0, i)))) {
				stack.push("<");
			}
		} else if (ch === ")" || ch === "]" || ch === "}") {
			dropPendingAngles(stack);
			const top = stack[stack.length - 1];
			if (top === undefined || top !== CLOSER_OF[ch]) return { _tag: "Broken" };
			stack.pop();
			if (stack.length === 0) return { _tag: "Closed", column: i + 1 };
		} else if (ch === ">") {
			// `->`, `operator>` and `operator>>` close nothing
			if (
				before === "-" ||
				OPERATOR_BEFORE.test(line.slice(0, i)) ||
				(before === ">" && OPERATOR_BEFORE.test(line.slice(0, i - 1)))
			) {
				continue;
			}
			if (stack[stack.length - 1] === "<") {
				stack.pop();
				if (stack.length === 0) return { _tag: "Closed", column: i + 1 };
			}
		} else if (ch === ";") {
			dropPendingAngles(stack);
			if (stack.length === 0) return { _tag: "Broken" };
		}
	}
	return { _tag: "Open", stack };
}

/**
 * Find where the bracket at `lines[index][column]` is closed.
 *
 * Returns `null` when the character is not an opener, is the start of
 * `<<`/`<=`, or the expression never closes before end of file.
 *
 * @pure true
 * @complexity O(k)
 *
 * @example
 * ```ts
 * closeExpression(["f(a,", "  b);"], 0, 1); // { index: 1, column: 4 }
 * ```
 */
export function closeExpression(
	lines: readonly string[],
	index: number,
	column: number,
): ExpressionEnd | null {
	const first = lines[index];
	if (first === undefined) return null;
	const ch = first.charAt(column);
	if (!"({[<".includes(ch) || ch === "" || /^<[<=]/.test(first.slice(column))) {
		return null;
	}

	let scan = scanLine(first, column, []);
	let current = index;
	while (scan._tag === "Open" && scan.stack.length > 0 && current < lines.length - 1) {
		current += 1;
		scan = scanLine(lines[current] ?? "", 0, scan.stack);
	}
	return scan._tag === "Closed" ? { index: current, column: scan.column } : null;
}

/**
 * Text between an opener and its closer, joined over lines with a space.
 *
 * @pure true
 */
export function expressionText(
	lines: readonly string[],
	index: number,
	column: number,
	end: ExpressionEnd,
): string {
	if (end.index === index) {
		return (lines[index] ?? "").slice(column + 1, end.column - 1);
	}
	const parts = [(lines[index] ?? "").slice(column + 1)];
	for (let i = index + 1; i < end.index; i += 1) parts.push((lines[i] ?? "").trim());
	parts.push((lines[end.index] ?? "").slice(0, end.column - 1).trim());
	return parts.join(" ");
}
