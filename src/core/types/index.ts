// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for types used across modules

export type {
	CountingMode,
	FilterRule,
	IncludeGroup,
	LintConfig,
	LintOptions,
	OutputFormat,
} from "./config.js";
export { COUNTING_MODES, INCLUDE_GROUPS, OUTPUT_FORMATS } from "./config.js";
export type { Diagnostic, Finding } from "./diagnostic.js";
export { finding, MAX_CONFIDENCE } from "./diagnostic.js";
export type {
	AccessMode,
	ConditionalDirective,
	ConditionalFrame,
	NestingSnapshot,
	NestingTrace,
	ScopeFrame,
	ScopeKind,
	ScopeRecord,
} from "./nesting.js";
export type {
	CleansedLine,
	CommentSegment,
	FileKind,
	LogicalLine,
	SourceFile,
	SuppressionMarker,
	SuppressionScope,
} from "./source.js";
