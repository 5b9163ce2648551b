// CHANGE: Configuration module exports for the shell
// WHY: One import point for argv parsing and the options file

export { type CLIOptions, parseCLIArgs, USAGE } from "./cli.js";
export { DEFAULT_CONFIG_FILE, loadOptionsFile, parseOptionsDocument } from "./loader.js";
