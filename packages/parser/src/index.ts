/**
 * @cmdtok/parser
 *
 * A small PEG-style parser combinator engine over immutable cursors.
 *
 * Provides:
 * - `Cursor`, a zero-copy view of a range of a string
 * - `ParseResult`, a tagged success/failure union
 * - `anyChar` and `char`, and the combinators the command grammar is built from
 *
 * @module
 */

// Core types
export type { ParseSuccess, ParseFailure, ParseResult, Parser, Chain } from "./types.js";

// Cursor and result constructors
export { Cursor, END_OF_INPUT, success, failure, isSuccess } from "./cursor.js";

// Combinator API
export {
  anyChar,
  char,
  seq,
  left,
  down,
  alt,
  except,
  many,
  many1,
  map,
  str,
} from "./combinators.js";
