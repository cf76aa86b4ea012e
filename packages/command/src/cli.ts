/**
 * cmdtok CLI -- split a command string the way a child process would see it
 *
 * Usage:
 *   cmdtok [options] [--] <text...>
 */

import { config } from "./config.js";
import { colorsEnabled, renderMalformedInput } from "./diagnostics.js";
import { chainLookups, envLookup, noVariables, recordLookup } from "./lookup.js";
import { tryTokenize } from "./tokenize.js";

export const EXIT_OK = 0;
export const EXIT_MALFORMED = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  /** Writer for tokens and help (default: console.log) */
  out: (line: string) => void;
  /** Writer for diagnostics and logs (default: console.error) */
  err: (line: string) => void;
  /** Environment for variables, CMDTOK_* settings and colors (default: process.env) */
  env: Readonly<Record<string, string | undefined>>;
  /** Directory to look for config files in (default: process.cwd()) */
  cwd: string;
}

interface CliOptions {
  help: boolean;
  preserveQuotes: boolean;
  json: boolean;
  useEnv: boolean;
  verbose: boolean;
  defines: Record<string, string>;
  words: string[];
}

type ParsedArgs = { ok: true; options: CliOptions } | { ok: false; message: string };

const USAGE = "Usage: cmdtok [options] [--] <text...>";

function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = {
    help: false,
    preserveQuotes: false,
    json: false,
    useEnv: true,
    verbose: false,
    defines: {},
    words: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") {
      options.words.push(...args.slice(i + 1));
      break;
    } else if (arg === "--preserve-quotes" || arg === "-q") {
      options.preserveQuotes = true;
    } else if (arg === "--json" || arg === "-j") {
      options.json = true;
    } else if (arg === "--no-env") {
      options.useEnv = false;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--define" || arg === "-D") {
      const definition = args[++i];
      if (definition === undefined) {
        return { ok: false, message: `Missing NAME=VALUE after ${arg}` };
      }
      const eq = definition.indexOf("=");
      if (eq <= 0) {
        return { ok: false, message: `Invalid definition '${definition}', expected NAME=VALUE` };
      }
      options.defines[definition.slice(0, eq)] = definition.slice(eq + 1);
    } else if (arg.startsWith("-") && arg !== "-") {
      return { ok: false, message: `Unknown option: ${arg}` };
    } else {
      options.words.push(arg);
    }
  }

  return { ok: true, options };
}

function helpText(): string {
  return `
cmdtok - Split a command string into arguments

USAGE:
  cmdtok [options] [--] <text...>

  Several words are joined with single spaces before splitting.

OPTIONS:
  -q, --preserve-quotes   Keep the double quotes around quoted terms
  -j, --json              Print the tokens as a JSON array
  -D, --define NAME=VALUE Define a variable for %NAME% (repeatable)
      --no-env            Do not resolve %NAME% from the environment
  -v, --verbose           Log configuration and token counts to stderr
  -h, --help              Show this help message

EXAMPLES:
  cmdtok 'run "My Project" --configuration %CONFIGURATION%'
  cmdtok --json -D OUT=bin -- 'publish -o %OUT%'
`;
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(argv: readonly string[], io: Partial<CliIO> = {}): number {
  const out = io.out ?? ((line: string) => console.log(line));
  const err = io.err ?? ((line: string) => console.error(line));
  const env = io.env ?? process.env;

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    err(parsed.message);
    err(USAGE);
    return EXIT_USAGE;
  }

  const { options } = parsed;
  if (options.help) {
    out(helpText());
    return EXIT_OK;
  }
  if (options.words.length === 0) {
    err("Missing command text");
    err(USAGE);
    return EXIT_USAGE;
  }

  config.load({ cwd: io.cwd ?? process.cwd(), env });
  const verbose = options.verbose || config.get("debug") === true;
  const preserveQuotes = options.preserveQuotes || config.get("preserveQuotes") === true;
  const useEnv = options.useEnv && config.get("useEnv") !== false;

  if (verbose) {
    const configPath = config.getConfigFilePath();
    err(`[cmdtok] Using config: ${configPath ?? "(none)"}`);
  }

  const lookup = chainLookups(
    recordLookup(options.defines),
    recordLookup(config.get("variables") ?? {}),
    useEnv ? envLookup(env) : noVariables
  );

  const text = options.words.join(" ");
  const result = tryTokenize(text, lookup, preserveQuotes);

  if (!result.ok) {
    err(renderMalformedInput(result.error, { colors: colorsEnabled(env) }));
    return EXIT_MALFORMED;
  }

  if (verbose) {
    const count = result.tokens.length;
    err(`[cmdtok] Split into ${count} token${count === 1 ? "" : "s"}`);
  }

  if (options.json) {
    out(JSON.stringify(result.tokens));
  } else {
    for (const token of result.tokens) {
      out(token);
    }
  }
  return EXIT_OK;
}
