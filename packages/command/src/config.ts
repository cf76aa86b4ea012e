/**
 * Configuration for the cmdtok CLI.
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: CMDTOK_*
 * 3. Config files: .cmdtokrc, .cmdtokrc.json, cmdtok.config.js, etc.
 *    or the "cmdtok" key of package.json
 * 4. Defaults (lowest priority)
 *
 * @example Config file (.cmdtokrc.json)
 * ```json
 * {
 *   "preserveQuotes": true,
 *   "variables": { "CONFIGURATION": "Release" }
 * }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface CmdtokConfig {
  /** Log configuration and token counts to stderr */
  debug?: boolean;
  /** Keep surrounding quotes on quoted terms by default */
  preserveQuotes?: boolean;
  /** Resolve %NAME% from the process environment */
  useEnv?: boolean;
  /** Extra variables; these win over the environment */
  variables?: Record<string, string>;
}

type Env = Readonly<Record<string, string | undefined>>;

export interface LoadOptions {
  /** Directory to look for config files in (default: process.cwd()) */
  cwd?: string;
  /** Environment to read CMDTOK_* variables from (default: process.env) */
  env?: Env;
}

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "cmdtok";
const ENV_PREFIX = "CMDTOK_";
const ENV_VARIABLE_PREFIX = `${ENV_PREFIX}VAR_`;

const BOOLEAN_KEYS = {
  DEBUG: "debug",
  PRESERVE_QUOTES: "preserveQuotes",
  USE_ENV: "useEnv",
} as const satisfies Record<string, keyof CmdtokConfig>;

type BooleanKey = (typeof BOOLEAN_KEYS)[keyof typeof BOOLEAN_KEYS];

const DEFAULTS: Required<CmdtokConfig> = {
  debug: false,
  preserveQuotes: false,
  useEnv: true,
  variables: {},
};

let configStore: CmdtokConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Validation and Merging
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBooleanKey(key: string): key is BooleanKey {
  return Object.values(BOOLEAN_KEYS).some((k) => k === key);
}

function isBooleanEnvSuffix(suffix: string): suffix is keyof typeof BOOLEAN_KEYS {
  return Object.hasOwn(BOOLEAN_KEYS, suffix);
}

/**
 * Keep the known, well-typed fields of an untrusted config object.
 */
export function normalizeConfig(raw: unknown, source: string): CmdtokConfig {
  const result: CmdtokConfig = {};
  if (!isRecord(raw)) {
    console.warn(`[cmdtok] Ignoring config from ${source}: expected an object`);
    return result;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (isBooleanKey(key)) {
      if (typeof value === "boolean") {
        result[key] = value;
      } else {
        console.warn(`[cmdtok] Ignoring "${key}" from ${source}: expected a boolean`);
      }
    } else if (key === "variables") {
      if (!isRecord(value)) {
        console.warn(`[cmdtok] Ignoring "variables" from ${source}: expected an object`);
        continue;
      }
      const variables: Record<string, string> = {};
      for (const [name, v] of Object.entries(value)) {
        if (typeof v === "string") {
          variables[name] = v;
        } else {
          console.warn(`[cmdtok] Ignoring variable "${name}" from ${source}: expected a string`);
        }
      }
      result.variables = variables;
    } else {
      console.warn(`[cmdtok] Ignoring unknown option "${key}" from ${source}`);
    }
  }

  return result;
}

/**
 * Merge configs (right takes precedence). Variables merge by name.
 */
function mergeConfig(target: CmdtokConfig, source: CmdtokConfig): CmdtokConfig {
  const result: CmdtokConfig = { ...target };

  for (const key of Object.values(BOOLEAN_KEYS)) {
    const value = source[key];
    if (value !== undefined) result[key] = value;
  }

  if (source.variables !== undefined) {
    result.variables = { ...target.variables, ...source.variables };
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   CMDTOK_DEBUG=1                → { debug: true }
 *   CMDTOK_PRESERVE_QUOTES=false  → { preserveQuotes: false }
 *   CMDTOK_VAR_CONFIGURATION=Dev  → { variables: { CONFIGURATION: "Dev" } }
 */
function loadConfigFromEnv(env: Env): CmdtokConfig {
  const envConfig: CmdtokConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    if (key.startsWith(ENV_VARIABLE_PREFIX)) {
      const name = key.slice(ENV_VARIABLE_PREFIX.length);
      if (name !== "") {
        envConfig.variables = { ...envConfig.variables, [name]: value };
      }
      continue;
    }

    const suffix = key.slice(ENV_PREFIX.length);
    if (!isBooleanEnvSuffix(suffix)) continue;
    const configKey = BOOLEAN_KEYS[suffix];

    if (value === "1" || value === "true") {
      envConfig[configKey] = true;
    } else if (value === "0" || value === "false" || value === "") {
      envConfig[configKey] = false;
    } else {
      console.warn(`[cmdtok] Ignoring ${key}=${value}: expected 1, 0, true or false`);
    }
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

/**
 * Load configuration from the first config file found in `cwd`.
 * A file that fails to load is reported and skipped.
 */
function loadConfigFromFiles(cwd: string): CmdtokConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search(cwd);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return normalizeConfig(result.config, result.filepath);
    }
  } catch (error) {
    console.warn(`[cmdtok] Failed to load config file:`, error);
  }
  return {};
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Load configuration from all sources, replacing anything loaded or set before.
 */
function load(options: LoadOptions = {}): void {
  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles(options.cwd ?? process.cwd());
  const envConfig = loadConfigFromEnv(options.env ?? process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = mergeConfig(mergeConfig(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

function initializeConfig(): void {
  if (!configLoaded) load();
}

/**
 * Get a configuration value.
 */
function get<K extends keyof CmdtokConfig>(key: K): CmdtokConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 */
function set(values: CmdtokConfig): void {
  initializeConfig();
  configStore = mergeConfig(configStore, values);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<CmdtokConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read loads it again (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  load,
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: CmdtokConfig): CmdtokConfig {
  return cfg;
}
