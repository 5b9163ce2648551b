// CHANGE: Load checker options from a JSON file
// WHY: Project-wide settings live beside the sources; command-line flags override them
// PURITY: SHELL (reads the file system)
// EFFECT: Effect<LintOptions, InvalidOption>
// INVARIANT: A missing default file yields {}; a missing explicit file or a malformed document is an error
// COMPLEXITY: O(|file|)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { InvalidOption } from "../../core/errors.js";
import type { LintOptions } from "../../core/types/index.js";

/**
 * File looked up in the working directory when no `--config=` is given.
 */
export const DEFAULT_CONFIG_FILE = "cxxstyle.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Type guard to check if value is a JSON object.
 */
function isJSONObject(value: unknown): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Type guard to check if value is an array of strings.
 */
function isStringArray(value: JSONValue): value is readonly string[] {
	return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

const NUMBER_KEYS = [
	"lineLength",
	"minConfidence",
	"failureConfidence",
	"functionLengthThreshold",
	"concurrency",
] as const;

const STRING_KEYS = ["counting", "output"] as const;

const LIST_KEYS = ["headerExtensions", "sourceExtensions", "includeOrder"] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set([
	...NUMBER_KEYS,
	...STRING_KEYS,
	...LIST_KEYS,
	"filters",
]);

/**
 * Validate a parsed options document.
 *
 * @returns The options, or a description of the first problem found
 *
 * @pure true
 */
export function parseOptionsDocument(document: unknown): LintOptions | string {
	if (!isJSONObject(document)) return "top-level value must be an object";

	const unknownKey = Object.keys(document).find((key) => !KNOWN_KEYS.has(key));
	if (unknownKey !== undefined) return `unknown key "${unknownKey}"`;

	const options: Mutable<LintOptions> = {};
	for (const key of NUMBER_KEYS) {
		const value = document[key];
		if (value === undefined) continue;
		if (typeof value !== "number") return `"${key}" must be a number`;
		options[key] = value;
	}
	for (const key of STRING_KEYS) {
		const value = document[key];
		if (value === undefined) continue;
		if (typeof value !== "string") return `"${key}" must be a string`;
		options[key] = value;
	}
	for (const key of LIST_KEYS) {
		const value = document[key];
		if (value === undefined) continue;
		if (!isStringArray(value)) return `"${key}" must be an array of strings`;
		options[key] = value;
	}
	const filters = document["filters"];
	if (filters !== undefined) {
		if (typeof filters !== "string" && !isStringArray(filters)) {
			return '"filters" must be a string or an array of strings';
		}
		options.filters = filters;
	}
	return options;
}

/**
 * Load options from `configPath`, or from `cxxstyle.json` in `cwd` when it exists.
 *
 * @effect Effect<LintOptions, InvalidOption>
 */
export const loadOptionsFile = (
	configPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<LintOptions, InvalidOption> => {
	const target = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
	if (configPath === undefined && !fs.existsSync(target)) {
		return Effect.succeed({});
	}
	return Effect.try({
		try: (): unknown => JSON.parse(fs.readFileSync(target, "utf8")),
		catch: (error) =>
			new InvalidOption({
				option: "config",
				detail: `${target}: ${error instanceof Error ? error.message : String(error)}`,
			}),
	}).pipe(
		Effect.flatMap((document) => {
			const parsed = parseOptionsDocument(document);
			return typeof parsed === "string"
				? Effect.fail(new InvalidOption({ option: "config", detail: `${target}: ${parsed}` }))
				: Effect.succeed(parsed);
		}),
	);
};
