/**
 * Command-line grammar
 *
 * Quoting, escaping and `%NAME%` substitution for a single command string,
 * assembled from the @cmdtok/parser combinators. Rule order is precedence:
 * in every `alt`, the first alternative is tried first.
 *
 * ```
 * variable   = '%' (!'%' .)* '%'
 * escape     = '%' '%' | '^' '^' | '\' '\' | '\' '"'
 * special    = variable | escape
 * unquoted   = (!special !' ' !'"' .)+
 * quoted     = (!special !'"' .)+
 * bareTerm   = (unquoted | special)+
 * quotedTerm = '"' (quoted | special)* '"'
 * term       = ' '* (quotedTerm | bareTerm) ' '*
 * terms      = term*
 * ```
 *
 * A bare `"` never belongs to an unquoted piece. An unterminated quote is
 * therefore malformed, and a quote glued to a word starts a new term:
 * `--opt="a b"` gives `--opt=` and `a b`.
 */

import {
  alt,
  anyChar,
  char,
  down,
  except,
  left,
  many,
  many1,
  map,
  seq,
  str,
  type Parser,
} from "@cmdtok/parser";
import type { VariableLookup } from "./lookup.js";

export interface CommandGrammarOptions {
  /** Resolves `%NAME%` references. */
  readonly lookup: VariableLookup;
  /** Keep the double quotes around quoted terms in the output tokens. */
  readonly preserveQuotes: boolean;
}

/** Every rule of the grammar, so that each can be exercised on its own. */
export interface CommandGrammar {
  readonly environmentVariablePiece: Parser<string>;
  readonly escapeSequencePiece: Parser<string>;
  readonly specialPiece: Parser<string>;
  readonly unquotedPiece: Parser<string>;
  readonly quotedPiece: Parser<string>;
  readonly unquotedTerm: Parser<string>;
  readonly quotedTerm: Parser<string>;
  readonly term: Parser<string>;
  readonly terms: Parser<string[]>;
}

/** Two fixed characters standing for `replacement`. */
function escapePair(first: string, second: string, replacement: string): Parser<string> {
  return map(seq(char(first), char(second)), () => replacement);
}

/** `open`, then `p`, then `close`, keeping the value of `p`. */
function enclosed<T>(open: Parser<unknown>, p: Parser<T>, close: Parser<unknown>): Parser<T> {
  return down(left(seq(seq(open, p), close)));
}

/**
 * Build the parser tree for one set of options.
 *
 * Pure: the options are only read, and the returned parsers hold no state,
 * so a grammar may be shared or rebuilt freely.
 */
export function commandGrammar(options: CommandGrammarOptions): CommandGrammar {
  const { lookup, preserveQuotes } = options;

  const percent = char("%");
  const space = char(" ");
  const quote = char('"');

  // An unresolved name (including the empty name of "%%") is put back as written.
  const environmentVariablePiece = map(
    enclosed(percent, str(many(except(anyChar(), percent))), percent),
    (name) => lookup(name) ?? `%${name}%`
  );

  // "%%" here is shadowed by environmentVariablePiece, which always claims it first.
  const escapeSequencePiece = alt(
    alt(escapePair("%", "%", "%"), escapePair("^", "^", "^")),
    alt(escapePair("\\", "\\", "\\"), escapePair("\\", '"', '"'))
  );

  const specialPiece = alt(environmentVariablePiece, escapeSequencePiece);

  const plainChar = except(anyChar(), specialPiece);
  const unquotedPiece = str(many1(except(except(plainChar, space), quote)));
  const quotedPiece = str(many1(except(plainChar, quote)));

  const unquotedTerm = str(many1(alt(unquotedPiece, specialPiece)));

  const quotedBody = enclosed(quote, str(many(alt(quotedPiece, specialPiece))), quote);
  const quotedTerm = preserveQuotes ? map(quotedBody, (body) => `"${body}"`) : quotedBody;

  const whitespace = many(space);
  const term = enclosed(whitespace, alt(quotedTerm, unquotedTerm), whitespace);

  return {
    environmentVariablePiece,
    escapeSequencePiece,
    specialPiece,
    unquotedPiece,
    quotedPiece,
    unquotedTerm,
    quotedTerm,
    term,
    terms: many(term),
  };
}
