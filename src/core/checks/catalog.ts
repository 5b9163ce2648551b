// CHANGE: Standard header catalog used to classify includes
// WHY: C vs C++ system headers cannot be told apart by syntax alone
// PURITY: CORE (reads the packaged data file once, on first use)
// INVARIANT: The catalog is immutable after loading
// COMPLEXITY: O(1) lookups after an O(n) load

import * as fs from "node:fs";

/**
 * Known system header names split by language.
 */
export interface HeaderCatalog {
	readonly c: ReadonlySet<string>;
	readonly cpp: ReadonlySet<string>;
}

const CATALOG_URL = new URL("../../../data/headers.json", import.meta.url);

const isStringArray = (value: unknown): value is readonly string[] =>
	Array.isArray(value) && value.every((entry) => typeof entry === "string");

/**
 * Validate the parsed catalog document.
 *
 * @pure true
 */
export function parseCatalog(document: unknown): HeaderCatalog | null {
	if (typeof document !== "object" || document === null) return null;
	if (!("c" in document) || !("cpp" in document)) return null;
	const { c, cpp } = document;
	if (!isStringArray(c) || !isStringArray(cpp)) return null;
	return { c: new Set(c), cpp: new Set(cpp) };
}

let cached: HeaderCatalog | undefined;

/**
 * Catalog shipped in `data/headers.json`.
 *
 * @throws Error when the packaged file is missing or malformed
 */
export function headerCatalog(): HeaderCatalog {
	if (cached !== undefined) return cached;
	const document: unknown = JSON.parse(fs.readFileSync(CATALOG_URL, "utf8"));
	const catalog = parseCatalog(document);
	if (catalog === null) {
		throw new Error(`Malformed header catalog: ${CATALOG_URL.pathname}`);
	}
	cached = catalog;
	return catalog;
}
