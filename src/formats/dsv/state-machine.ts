/**
 * CSV State Machine Module
 *
 * RFC 4180 row parsing: quoted fields, doubled quotes inside quotes, empty
 * fields and a trailing delimiter.
 */

import { FormatError } from "../../errors";
import { CSVParseState } from "./types";

/**
 * Count unescaped quotes in a line
 *
 * @param line - The line to analyze
 * @param quote - Quote character (usually ")
 * @param escapeChar - Escape character (usually same as quote for RFC 4180)
 */
export function countUnescapedQuotes(line: string, quote: string, escapeChar: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] === quote) {
      if (escapeChar === quote && line[i + 1] === quote) {
        i++;
      } else {
        count++;
      }
    }
  }
  return count;
}

/**
 * Check if quotes are balanced in a line
 *
 * An odd count means a quoted field continues on the next physical line.
 */
export function hasBalancedQuotes(line: string, quote: string, escapeChar: string): boolean {
  return countUnescapedQuotes(line, quote, escapeChar) % 2 === 0;
}

/**
 * Parse one CSV row into fields
 *
 * @param line - CSV line to parse (may contain embedded newlines inside quotes)
 * @param delimiter - Field delimiter
 * @param quote - Quote character
 * @param escapeChar - Escape character (usually same as quote)
 * @param lineNumber - Source line, for error reporting
 * @throws {FormatError} When a quoted field is never closed
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ";",
  quote: string = '"',
  escapeChar: string = '"',
  lineNumber?: number
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (escapeChar === quote && line.charAt(i + 1) === quote) {
            currentField += quote;
            i++;
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Text after a closing quote: keep it as part of the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new FormatError("Unclosed quote in CSV field", "CSV", undefined, lineNumber, line);
  }
  if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    fields.push("");
  }

  return fields;
}
