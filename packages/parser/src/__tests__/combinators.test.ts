import { describe, it, expect } from "vitest";
import {
  Cursor,
  anyChar,
  char,
  seq,
  left,
  down,
  alt,
  many,
  many1,
  except,
  map,
  str,
} from "../index.js";
import type { Parser, ParseResult } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function run<T>(p: Parser<T>, text: string, start = 0): ParseResult<T> {
  return p.parse(new Cursor(text, start));
}

function ok<T>(value: T, text: string, pos: number) {
  return { ok: true, value, remainder: new Cursor(text, pos) };
}

/** Two characters in a row, as one string. */
function pair(a: string, b: string): Parser<string> {
  return map(seq(char(a), char(b)), ([x, y]) => x + y);
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("anyChar", () => {
  it("matches any character", () => {
    expect(run(anyChar(), "x")).toEqual(ok("x", "x", 1));
    expect(run(anyChar(), "\n")).toEqual(ok("\n", "\n", 1));
  });

  it("matches a NUL character in the text", () => {
    expect(run(anyChar(), "\0a")).toEqual(ok("\0", "\0a", 1));
  });

  it("fails on empty input", () => {
    expect(run(anyChar(), "")).toEqual({ ok: false, pos: 0, expected: "any character" });
  });

  it("fails at the end of a narrowed window", () => {
    expect(anyChar().parse(new Cursor("abc", 1, 1)).ok).toBe(false);
  });
});

describe("char", () => {
  it("matches a single character", () => {
    expect(run(char("x"), "xyz")).toEqual(ok("x", "xyz", 1));
  });

  it("fails on wrong character without consuming", () => {
    expect(run(char("x"), "abc")).toEqual({ ok: false, pos: 0, expected: '"x"' });
  });

  it("fails on empty input", () => {
    expect(run(char("x"), "").ok).toBe(false);
  });

  it("does not match the peek sentinel at end of input", () => {
    expect(run(char("\0"), "").ok).toBe(false);
  });

  it("rejects multi-character arguments", () => {
    expect(() => char("ab")).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

describe("seq", () => {
  it("sequences two parsers into a chain", () => {
    expect(run(seq(char("a"), char("b")), "abc")).toEqual(ok(["a", "b"], "abc", 2));
  });

  it("fails if the first parser fails", () => {
    expect(run(seq(char("a"), char("b")), "xbc")).toEqual({ ok: false, pos: 0, expected: '"a"' });
  });

  it("fails if the second parser fails, reporting where it started", () => {
    expect(run(seq(char("a"), char("b")), "axc")).toEqual({ ok: false, pos: 1, expected: '"b"' });
  });

  it("does not retry a committed first parser", () => {
    // many(char("a")) takes every "a", leaving none for the second step
    const p = seq(many(char("a")), char("a"));
    expect(run(p, "aaa").ok).toBe(false);
  });
});

describe("left and down", () => {
  const pair = seq(char("a"), char("b"));

  it("left keeps the first value", () => {
    expect(run(left(pair), "ab!")).toEqual(ok("a", "ab!", 2));
  });

  it("down keeps the second value", () => {
    expect(run(down(pair), "ab!")).toEqual(ok("b", "ab!", 2));
  });

  it("left then down extracts the middle of three", () => {
    const middle = down(left(seq(seq(char("("), char("x")), char(")"))));
    expect(run(middle, "(x)")).toEqual(ok("x", "(x)", 3));
  });

  it("propagates failure", () => {
    expect(run(left(pair), "ax").ok).toBe(false);
  });
});

describe("alt", () => {
  it("returns first match", () => {
    expect(run(alt(char("a"), char("b")), "abc")).toEqual(ok("a", "abc", 1));
  });

  it("tries second on first failure", () => {
    expect(run(alt(char("a"), char("b")), "bcd")).toEqual(ok("b", "bcd", 1));
  });

  it("retries the second alternative from the original position", () => {
    const p = alt(pair("a", "b"), pair("a", "c"));
    expect(run(p, "ac")).toEqual(ok("ac", "ac", 2));
  });

  it("prefers order over match length", () => {
    const p = alt(char("a"), pair("a", "b"));
    expect(run(p, "ab")).toEqual(ok("a", "ab", 1));
  });

  it("fails when both fail, joining expectations", () => {
    expect(run(alt(char("a"), char("b")), "xyz")).toEqual({
      ok: false,
      pos: 0,
      expected: '"a" or "b"',
    });
  });

  it("reports the furthest failure position", () => {
    const p = alt(seq(char("a"), char("b")), char("c"));
    const r = run(p, "ax");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.pos).toBe(1);
  });
});

describe("many", () => {
  it("matches zero occurrences", () => {
    expect(run(many(char("a")), "bbb")).toEqual(ok([], "bbb", 0));
  });

  it("matches multiple occurrences", () => {
    expect(run(many(char("a")), "aaab")).toEqual(ok(["a", "a", "a"], "aaab", 3));
  });

  it("stops on zero-width matches", () => {
    expect(run(many(many(char("x"))), "abc")).toEqual(ok([], "abc", 0));
  });

  it("succeeds on empty input", () => {
    expect(run(many(char("x")), "")).toEqual(ok([], "", 0));
  });
});

describe("many1", () => {
  it("fails on zero occurrences", () => {
    expect(run(many1(char("a")), "bbb")).toEqual({ ok: false, pos: 0, expected: '"a"' });
  });

  it("matches one or more", () => {
    expect(run(many1(char("a")), "aab")).toEqual(ok(["a", "a"], "aab", 2));
  });

  it("terminates on a zero-width parser", () => {
    expect(run(many1(many(char("x"))), "abc")).toEqual(ok([[]], "abc", 0));
  });
});

describe("except", () => {
  it("runs the parser when the excluded parser fails", () => {
    expect(run(except(anyChar(), char("%")), "x%")).toEqual(ok("x", "x%", 1));
  });

  it("fails without consuming when the excluded parser matches", () => {
    expect(run(except(anyChar(), char("%")), "%x")).toEqual({
      ok: false,
      pos: 0,
      expected: 'not "%"',
    });
  });

  it("discards whatever the excluded parser consumed", () => {
    // The excluded parser would consume two characters but still blocks only one
    const p = many(except(anyChar(), pair("a", "b")));
    expect(run(p, "xxab")).toEqual(ok(["x", "x"], "xxab", 2));
  });

  it("checks the excluded parser before the main parser", () => {
    let calls = 0;
    const counted = map(anyChar(), (c) => {
      calls++;
      return c;
    });
    run(except(counted, char("a")), "a");
    expect(calls).toBe(0);
  });

  it("chains to exclude several constructs", () => {
    const word = str(many1(except(except(anyChar(), char(" ")), char('"'))));
    expect(run(word, 'ab"cd')).toEqual(ok("ab", 'ab"cd', 2));
    expect(run(word, "ab cd")).toEqual(ok("ab", "ab cd", 2));
  });
});

describe("map", () => {
  it("transforms the result", () => {
    const p = map(many1(char("1")), (ones) => ones.length * 2);
    expect(run(p, "111")).toEqual(ok(6, "111", 3));
  });

  it("propagates failure", () => {
    expect(run(map(char("a"), (c) => c.toUpperCase()), "b").ok).toBe(false);
  });
});

describe("str", () => {
  it("folds characters into a string", () => {
    expect(run(str(many(anyChar())), "abc")).toEqual(ok("abc", "abc", 3));
  });

  it("folds strings into a string", () => {
    const p = str(many(alt(pair("a", "b"), char("c"))));
    expect(run(p, "abcab!")).toEqual(ok("abcab", "abcab!", 5));
  });

  it("folds an empty sequence into an empty string", () => {
    expect(run(str(many(char("z"))), "abc")).toEqual(ok("", "abc", 0));
  });
});
