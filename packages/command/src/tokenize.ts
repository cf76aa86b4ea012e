import { Cursor } from "@cmdtok/parser";
import { MalformedInputError } from "./errors.js";
import { commandGrammar } from "./grammar.js";
import type { VariableLookup } from "./lookup.js";

export type TokenizeResult =
  | { readonly ok: true; readonly tokens: string[] }
  | { readonly ok: false; readonly error: MalformedInputError };

/**
 * Split `text` into argument tokens without throwing.
 *
 * Builds a fresh grammar for the call, so concurrent callers never share
 * parser state.
 */
export function tryTokenize(
  text: string,
  lookup: VariableLookup,
  preserveSurroundingQuotes = false
): TokenizeResult {
  const { terms } = commandGrammar({ lookup, preserveQuotes: preserveSurroundingQuotes });
  const result = terms.parse(Cursor.of(text));

  if (!result.ok) {
    return { ok: false, error: new MalformedInputError(text, result.pos) };
  }
  if (!result.remainder.isEnd) {
    return { ok: false, error: new MalformedInputError(text, result.remainder.start) };
  }
  return { ok: true, tokens: result.value };
}

/**
 * Split `text` into argument tokens, applying quoting, escapes and
 * `%NAME%` substitution.
 *
 * @throws MalformedInputError if any part of `text` cannot form a term
 */
export function tokenize(
  text: string,
  lookup: VariableLookup,
  preserveSurroundingQuotes = false
): string[] {
  const result = tryTokenize(text, lookup, preserveSurroundingQuotes);
  if (!result.ok) {
    throw result.error;
  }
  return result.tokens;
}
