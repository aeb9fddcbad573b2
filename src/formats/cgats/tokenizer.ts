/**
 * CGATS line tokenizer
 */

import type { CgatsToken } from "./types";

/**
 * Split a CGATS line into tokens
 *
 * Tokens are separated by spaces or tabs; a double-quoted token may contain
 * whitespace. A `#` outside quotes starts a comment that runs to end of line.
 *
 * @returns Tokens, and the comment text when the line has one
 */
export function tokenizeCgatsLine(line: string): { tokens: CgatsToken[]; comment?: string } {
  const tokens: CgatsToken[] = [];
  let i = 0;

  while (i < line.length) {
    const char = line.charAt(i);

    if (char === " " || char === "\t") {
      i++;
      continue;
    }

    if (char === "#") {
      return { tokens, comment: line.slice(i + 1).trim() };
    }

    if (char === '"') {
      const end = line.indexOf('"', i + 1);
      if (end === -1) {
        // Unterminated quote runs to end of line
        tokens.push({ text: line.slice(i + 1), quoted: true });
        break;
      }
      tokens.push({ text: line.slice(i + 1, end), quoted: true });
      i = end + 1;
      continue;
    }

    let end = i;
    while (end < line.length && !isSeparator(line.charAt(end))) {
      end++;
    }
    tokens.push({ text: line.slice(i, end), quoted: false });
    i = end;
  }

  return { tokens };
}

function isSeparator(char: string): boolean {
  return char === " " || char === "\t";
}
