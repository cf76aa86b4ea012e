/**
 * Terminal rendering for malformed command text, in the same layout as
 * compiler diagnostics:
 *
 * ```
 * error: malformed command text
 *   --> input:1:3
 *    |
 *  1 | ab"cd
 *    |   ^ unterminated quoted term
 *    |
 *    = help: close the term with `"` or escape the quote as `\"`
 * ```
 */

import type { MalformedInputError } from "./errors.js";

// ============================================================================
// Colors
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or CMDTOK_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  green: "\x1b[32m",
} as const;

type Style = Exclude<keyof typeof COLORS, "reset">;

/**
 * Check if colors should be used for the given environment.
 */
export function colorsEnabled(env: Readonly<Record<string, string | undefined>> = process.env): boolean {
  return !env.NO_COLOR && !env.CMDTOK_NO_COLOR && env.FORCE_COLOR !== "0";
}

// ============================================================================
// Rendering
// ============================================================================

export interface RenderOptions {
  /** Whether to use colors (default: auto-detect from the environment) */
  colors?: boolean;
}

interface Finding {
  /** Offset the caret points at. */
  pos: number;
  label: string;
  help: string;
}

/**
 * Explain an unconsumed suffix. Spaces before the offending term belong to
 * that term, so the caret skips them.
 */
function describe(text: string, offset: number): Finding {
  let pos = offset;
  while (pos < text.length && text.charAt(pos) === " ") pos++;

  if (pos === text.length) {
    return { pos: offset, label: "no term found", help: "the text contains only spaces" };
  }
  if (text.charAt(pos) === '"') {
    return {
      pos,
      label: "unterminated quoted term",
      help: 'close the term with `"` or escape the quote as `\\"`',
    };
  }
  return { pos, label: "cannot start a term here", help: "quote or escape this character" };
}

/** Convert a zero-based offset to a 1-based line and column. */
function lineCol(text: string, pos: number): { line: number; col: number } {
  const before = text.slice(0, pos).split("\n");
  return { line: before.length, col: before[before.length - 1].length + 1 };
}

/**
 * Render a MalformedInputError for a terminal.
 */
export function renderMalformedInput(
  error: MalformedInputError,
  options: RenderOptions = {}
): string {
  const useColors = options.colors ?? colorsEnabled();
  const paint = (text: string, ...styles: Style[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const { pos, label, help } = describe(error.text, error.offset);
  const { line, col } = lineCol(error.text, pos);
  const lineText = error.text.split("\n")[line - 1];

  const lineNum = String(line);
  const gutter = " ".repeat(lineNum.length);
  const bar = paint("|", "blue");
  const caret = `${" ".repeat(col - 1)}^ ${label}`;

  return [
    `${paint("error", "bold", "red")}: ${paint("malformed command text", "bold")}`,
    `  ${paint("-->", "blue")} input:${line}:${col}`,
    ` ${gutter} ${bar}`,
    ` ${paint(lineNum, "blue")} ${bar} ${lineText}`,
    ` ${gutter} ${bar} ${paint(caret, "red")}`,
    ` ${gutter} ${bar}`,
    `   ${paint("= help:", "bold", "green")} ${help}`,
  ].join("\n");
}
