/**
 * Text helpers for delimited files
 */

import { hasBalancedQuotes } from "./state-machine";

/**
 * Remove a leading byte order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize line endings to LF
 * Handles Windows (CRLF), Classic Mac (CR), and Unix (LF)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * A logical record of a delimited file and the line it starts on
 */
export interface LogicalLine {
  readonly text: string;
  readonly lineNumber: number;
}

/**
 * Split text into logical records
 *
 * Physical lines are joined while a quoted field is still open, so a newline
 * inside quotes stays part of the field.
 */
export function* splitLogicalLines(
  text: string,
  quote: string = '"',
  escapeChar: string = '"'
): Generator<LogicalLine> {
  const lines = normalizeLineEndings(removeBOM(text)).split("\n");
  let pending: string | undefined;
  let startLine = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (pending === undefined) {
      pending = line;
      startLine = i + 1;
    } else {
      pending += `\n${line}`;
    }

    if (hasBalancedQuotes(pending, quote, escapeChar)) {
      yield { text: pending, lineNumber: startLine };
      pending = undefined;
    }
  }

  if (pending !== undefined) {
    // Unbalanced to the end of the file; the row parser reports the open quote
    yield { text: pending, lineNumber: startLine };
  }
}

/**
 * Parse a numeric cell
 *
 * Accepts a decimal comma (`12,5`). Blank cells and the `nan` / `null`
 * placeholders some exporters write are treated as missing.
 *
 * @returns The number, `undefined` for a missing value, or `null` when the
 * cell holds text that is not a number
 */
export function parseDecimal(cell: string): number | undefined | null {
  const trimmed = cell.trim();
  if (trimmed === "" || MISSING_MARKERS.has(trimmed.toLowerCase())) {
    return undefined;
  }

  const normalized = trimmed.includes(",") && !trimmed.includes(".") ? trimmed.replace(",", ".") : trimmed;
  if (!NUMBER_PATTERN.test(normalized)) {
    return null;
  }
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

const MISSING_MARKERS = new Set(["nan", "null", "n/a", "-"]);

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
