/**
 * @cmdtok/command
 *
 * Splits a raw command-line string into argument tokens with quoting,
 * escape sequences and `%NAME%` variable substitution.
 *
 * @example
 * ```typescript
 * import { tokenize, recordLookup } from "@cmdtok/command";
 *
 * tokenize('build "My App" -c %CONFIG%', recordLookup({ CONFIG: "Release" }));
 * // → ["build", "My App", "-c", "Release"]
 * ```
 *
 * @module
 */

// Tokenization
export { tokenize, tryTokenize } from "./tokenize.js";
export type { TokenizeResult } from "./tokenize.js";

// Grammar
export { commandGrammar } from "./grammar.js";
export type { CommandGrammar, CommandGrammarOptions } from "./grammar.js";

// Variable lookups
export { noVariables, recordLookup, envLookup, chainLookups } from "./lookup.js";
export type { VariableLookup, EnvLookupOptions } from "./lookup.js";

// Errors and diagnostics
export { MalformedInputError } from "./errors.js";
export { renderMalformedInput, colorsEnabled } from "./diagnostics.js";
export type { RenderOptions } from "./diagnostics.js";

// Configuration
export { config, defineConfig, normalizeConfig } from "./config.js";
export type { CmdtokConfig, LoadOptions } from "./config.js";

// CLI
export { runCli, EXIT_OK, EXIT_MALFORMED, EXIT_USAGE } from "./cli.js";
export type { CliIO } from "./cli.js";
