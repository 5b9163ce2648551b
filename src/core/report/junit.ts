// CHANGE: JUnit XML report for CI ingestion
// PURITY: CORE
// INVARIANT: tests = errors + failures, or 1 when the run is clean
// COMPLEXITY: O(total diagnostics)

import type { FileResult } from "./types.js";

const XML_ESCAPES: Readonly<Record<string, string>> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&apos;",
};

/**
 * @pure true
 */
export const escapeXml = (text: string): string =>
	text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);

/**
 * Render the whole run as one `<testsuite>`.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderJUnit([]);
 * // <?xml version="1.0" encoding="UTF-8" ?>
 * // <testsuite errors="0" failures="0" name="cxxstyle" tests="1"><testcase name="passed" /></testsuite>
 * ```
 */
export function renderJUnit(files: readonly FileResult[]): string {
	const cases: string[] = [];
	let errors = 0;
	let failures = 0;

	for (const file of files) {
		const name = escapeXml(file.path);
		if (file.failure !== null) {
			errors += 1;
			cases.push(`<testcase name="${name}"><error>${escapeXml(file.failure)}</error></testcase>`);
			continue;
		}
		if (file.diagnostics.length === 0) continue;
		failures += file.diagnostics.length;
		const body = file.diagnostics
			.map((d) => `${d.line}: ${d.message} [${d.category}] [${d.confidence}]`)
			.join("\n");
		cases.push(`<testcase name="${name}"><failure>${escapeXml(body)}</failure></testcase>`);
	}

	const tests = errors + failures;
	const suite = `<testsuite errors="${errors}" failures="${failures}" name="cxxstyle" tests="${tests === 0 ? 1 : tests}">`;
	const content = tests === 0 ? '<testcase name="passed" />' : cases.join("");
	return `<?xml version="1.0" encoding="UTF-8" ?>\n${suite}${content}</testsuite>\n`;
}
