/**
 * Core types for @cmdtok/parser
 *
 * Defines the parse result, the parser interface and the pair produced by
 * sequencing two parsers.
 */

import type { Cursor } from "./cursor.js";

/** A successful parse: the produced value and the cursor to continue from. */
export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
  readonly remainder: Cursor;
}

/** A failed parse attempt. `pos` is the absolute offset the attempt started at. */
export interface ParseFailure {
  readonly ok: false;
  readonly pos: number;
  readonly expected: string;
}

/** Result of a parse attempt: a value and remainder, or the position and what was expected there. */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

/** A parser is a pure function from a cursor to a ParseResult. */
export interface Parser<T> {
  /** Attempt to parse at the cursor's current position. */
  parse(cursor: Cursor): ParseResult<T>;
}

/** Values of two sequenced parsers, `left` first. */
export type Chain<L, D> = readonly [left: L, down: D];
