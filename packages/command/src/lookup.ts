/**
 * Variable lookups for `%NAME%` substitution.
 *
 * A lookup is a pure total function: the same name always gives the same
 * answer, and `undefined` means "leave the reference as written".
 */

export type VariableLookup = (name: string) => string | undefined;

/** Resolves nothing; every reference round-trips literally. */
export const noVariables: VariableLookup = () => undefined;

/** Look names up in a plain record (own properties only). */
export function recordLookup(record: Readonly<Record<string, string>>): VariableLookup {
  const entries = new Map(Object.entries(record));
  return (name) => entries.get(name);
}

export interface EnvLookupOptions {
  /**
   * Match names regardless of case. Defaults to true on Windows, where
   * environment variable names are case-insensitive.
   */
  caseInsensitive?: boolean;
}

/**
 * Look names up in an environment snapshot.
 *
 * The environment is copied when the lookup is created so that later
 * changes to `env` cannot change the outcome of a tokenization. The empty
 * name never resolves.
 */
export function envLookup(
  env: Readonly<Record<string, string | undefined>> = process.env,
  options: EnvLookupOptions = {}
): VariableLookup {
  const caseInsensitive = options.caseInsensitive ?? process.platform === "win32";
  const fold = (name: string) => (caseInsensitive ? name.toUpperCase() : name);

  const snapshot = new Map<string, string>();
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || key === "") continue;
    const folded = fold(key);
    if (!snapshot.has(folded)) snapshot.set(folded, value);
  }

  return (name) => (name === "" ? undefined : snapshot.get(fold(name)));
}

/** First lookup to resolve a name wins. */
export function chainLookups(...lookups: VariableLookup[]): VariableLookup {
  return (name) => {
    for (const lookup of lookups) {
      const value = lookup(name);
      if (value !== undefined) return value;
    }
    return undefined;
  };
}
