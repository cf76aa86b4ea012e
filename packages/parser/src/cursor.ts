import type { ParseFailure, ParseResult, ParseSuccess } from "./types.js";

/** Returned by `peek` for offsets outside the cursor's window. */
export const END_OF_INPUT = "\0";

/**
 * Immutable view of the half-open range `[start, end)` of a string.
 *
 * All parsing state is a cursor value; advancing yields a new cursor and
 * never touches the old one.
 */
export class Cursor {
  readonly text: string;
  readonly start: number;
  readonly end: number;

  constructor(text: string, start = 0, end = text.length) {
    if (start < 0 || end > text.length || start > end) {
      throw new RangeError(`Invalid cursor range [${start}, ${end}) over ${text.length} characters`);
    }
    this.text = text;
    this.start = start;
    this.end = end;
  }

  /** A cursor spanning all of `text`. */
  static of(text: string): Cursor {
    return new Cursor(text, 0, text.length);
  }

  get isEnd(): boolean {
    return this.start === this.end;
  }

  get remaining(): number {
    return this.end - this.start;
  }

  /** Character at `start + offset`, or END_OF_INPUT past the window. */
  peek(offset = 0): string {
    if (offset < 0 || offset >= this.end - this.start) {
      return END_OF_INPUT;
    }
    return this.text.charAt(this.start + offset);
  }

  /**
   * Succeed with `value`, continuing `length` characters further on.
   *
   * Moving past `end` is a bug in the calling parser, so it throws rather
   * than failing the parse.
   */
  advance<T>(value: T, length: number): ParseResult<T> {
    if (length < 0 || length > this.end - this.start) {
      throw new RangeError(
        `Cannot advance ${length} characters with ${this.end - this.start} remaining`
      );
    }
    return success(value, new Cursor(this.text, this.start + length, this.end));
  }

  /** The text still in view. */
  slice(): string {
    return this.text.slice(this.start, this.end);
  }
}

export function success<T>(value: T, remainder: Cursor): ParseSuccess<T> {
  return { ok: true, value, remainder };
}

export function failure(pos: number, expected: string): ParseFailure {
  return { ok: false, pos, expected };
}

export function isSuccess<T>(result: ParseResult<T>): result is ParseSuccess<T> {
  return result.ok;
}
