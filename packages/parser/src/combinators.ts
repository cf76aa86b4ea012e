/**
 * Parser combinators for @cmdtok/parser
 *
 * Every combinator returns a `Parser<T>` and can be composed freely.
 * PEG semantics: ordered alternation, first match wins, and a sequence that
 * has committed to a sub-parse never goes back to try another one.
 */

import type { Cursor } from "./cursor.js";
import { failure } from "./cursor.js";
import type { Chain, Parser, ParseResult } from "./types.js";

function mkParser<T>(parse: (cursor: Cursor) => ParseResult<T>): Parser<T> {
  return { parse };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match any single character. */
export function anyChar(): Parser<string> {
  return mkParser((cursor) => {
    if (cursor.isEnd) {
      return failure(cursor.start, "any character");
    }
    return cursor.advance(cursor.peek(0), 1);
  });
}

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  if (c.length !== 1) {
    throw new RangeError(`char() expects exactly one character, got ${JSON.stringify(c)}`);
  }
  return mkParser((cursor) => {
    if (!cursor.isEnd && cursor.peek(0) === c) {
      return cursor.advance(c, 1);
    }
    return failure(cursor.start, JSON.stringify(c));
  });
}

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

/** Run `a`, then `b` from where `a` stopped. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<Chain<A, B>> {
  return mkParser((cursor) => {
    const ra = a.parse(cursor);
    if (!ra.ok) return ra;
    const rb = b.parse(ra.remainder);
    if (!rb.ok) return rb;
    return rb.remainder.advance<Chain<A, B>>([ra.value, rb.value], 0);
  });
}

/** Keep the first value of a sequenced pair. */
export function left<L, D>(p: Parser<Chain<L, D>>): Parser<L> {
  return map(p, ([l]) => l);
}

/** Keep the second value of a sequenced pair. */
export function down<L, D>(p: Parser<Chain<L, D>>): Parser<D> {
  return map(p, ([, d]) => d);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation: try `a` first, then `b` from the same position. */
export function alt<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser<A | B>((cursor) => {
    const ra = a.parse(cursor);
    if (ra.ok) return ra;
    const rb = b.parse(cursor);
    if (rb.ok) return rb;
    return failure(Math.max(ra.pos, rb.pos), `${ra.expected} or ${rb.expected}`);
  });
}

/**
 * Run `p` only where `excluded` fails.
 *
 * `excluded` is tried first at the same position; whatever it would have
 * consumed is discarded either way.
 */
export function except<T, U>(p: Parser<T>, excluded: Parser<U>): Parser<T> {
  return mkParser((cursor) => {
    const guard = excluded.parse(cursor);
    if (guard.ok) return failure(cursor.start, `not ${JSON.stringify(guard.value)}`);
    return p.parse(cursor);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Always succeeds. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((cursor) => {
    const results: T[] = [];
    let cur = cursor;
    for (;;) {
      const r = p.parse(cur);
      if (!r.ok) break;
      if (r.remainder.start === cur.start) break; // zero-width match
      results.push(r.value);
      cur = r.remainder;
    }
    return cur.advance(results, 0);
  });
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  const rest = many(p);
  return mkParser((cursor) => {
    const first = p.parse(cursor);
    if (!first.ok) return first;
    if (first.remainder.start === cursor.start) return cursor.advance([first.value], 0);
    const r = rest.parse(first.remainder);
    if (!r.ok) return r;
    return r.remainder.advance([first.value, ...r.value], 0);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((cursor) => {
    const r = p.parse(cursor);
    if (!r.ok) return r;
    return r.remainder.advance(f(r.value), 0);
  });
}

/** Concatenate a sequence of characters or strings, in order. */
export function str(p: Parser<readonly string[]>): Parser<string> {
  return map(p, (parts) => parts.join(""));
}
