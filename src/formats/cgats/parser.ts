/**
 * CGATS table parser
 *
 * Reads the header keywords, data format and data block of the first table in
 * a CGATS file. Semantic checks (which fields must exist, what the values
 * mean) belong to the format-specific readers built on top of this.
 */

import { FormatError } from "../../errors";
import { normalizeLineEndings, removeBOM } from "../dsv/utils";
import { tokenizeCgatsLine } from "./tokenizer";
import type { CgatsKeyword, CgatsRow, CgatsTable, CgatsToken } from "./types";

type Section = "header" | "format" | "data" | "done";

/**
 * Parse the first table of a CGATS document
 *
 * @param text - Complete file content
 * @param format - Format name used in error messages
 * @throws {FormatError} If the file identifier, a count keyword or the data
 * block is malformed
 */
export function parseCgats(text: string, format: "TI2" | "CGATS" | "TI3" = "CGATS"): CgatsTable {
  const lines = normalizeLineEndings(removeBOM(text)).split("\n");

  let fileType: string | undefined;
  const keywords: CgatsKeyword[] = [];
  const declaredKeywords: string[] = [];
  const fields: string[] = [];
  const rows: CgatsRow[] = [];
  let declaredFields: number | undefined;
  let declaredSets: number | undefined;
  let sawFormat = false;
  let section: Section = "header";

  const fail = (message: string, lineNumber: number, context?: string): FormatError =>
    new FormatError(message, format, undefined, lineNumber, context);

  for (let index = 0; index < lines.length && section !== "done"; index++) {
    const lineNumber = index + 1;
    const line = lines[index] ?? "";
    const { tokens } = tokenizeCgatsLine(line);
    const first = tokens[0];
    if (first === undefined) continue;

    if (fileType === undefined) {
      fileType = first.text;
      continue;
    }

    switch (section) {
      case "header": {
        const rest = tokens.slice(1);
        switch (first.text) {
          case "KEYWORD":
            declaredKeywords.push(...rest.map((token) => token.text));
            break;
          case "NUMBER_OF_FIELDS":
            declaredFields = parseCount(rest, "NUMBER_OF_FIELDS", format, lineNumber);
            break;
          case "NUMBER_OF_SETS":
            declaredSets = parseCount(rest, "NUMBER_OF_SETS", format, lineNumber);
            break;
          case "BEGIN_DATA_FORMAT": {
            sawFormat = true;
            const closing = rest.findIndex((token) => token.text === "END_DATA_FORMAT");
            const names = closing === -1 ? rest : rest.slice(0, closing);
            fields.push(...names.map((token) => token.text));
            if (closing === -1) section = "format";
            break;
          }
          case "BEGIN_DATA":
            if (!sawFormat || fields.length === 0) {
              throw fail("BEGIN_DATA without a preceding data format block", lineNumber);
            }
            section = "data";
            break;
          case "END_DATA":
          case "END_DATA_FORMAT":
            throw fail(`Unexpected ${first.text}`, lineNumber, line);
          default:
            keywords.push({
              key: first.text,
              value: rest.map((token) => token.text).join(" "),
              quoted: rest[0]?.quoted ?? false,
              lineNumber,
            });
        }
        break;
      }

      case "format": {
        const closing = tokens.findIndex((token) => token.text === "END_DATA_FORMAT");
        const names = closing === -1 ? tokens : tokens.slice(0, closing);
        fields.push(...names.map((token) => token.text));
        if (closing !== -1) section = "header";
        break;
      }

      case "data":
        if (first.text === "END_DATA" && !first.quoted) {
          section = "done";
        } else {
          rows.push({ values: tokens.map((token) => token.text), lineNumber });
        }
        break;
    }
  }

  if (fileType === undefined) {
    throw new FormatError("Empty CGATS file: no file identifier line", format);
  }
  if (section === "format") {
    throw new FormatError("Data format block is not terminated by END_DATA_FORMAT", format);
  }
  if (section === "data") {
    throw new FormatError("Data block is not terminated by END_DATA", format);
  }

  return {
    fileType,
    keywords,
    declaredKeywords,
    fields,
    ...(declaredFields !== undefined ? { declaredFields } : {}),
    ...(declaredSets !== undefined ? { declaredSets } : {}),
    rows,
  };
}

/**
 * Find a header keyword's value by name
 */
export function getKeyword(table: CgatsTable, key: string): string | undefined {
  return table.keywords.find((keyword) => keyword.key === key)?.value;
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function parseCount(
  tokens: CgatsToken[],
  key: string,
  format: FormatError["format"],
  lineNumber: number
): number {
  const raw = tokens[0]?.text ?? "";
  if (!/^\d+$/.test(raw)) {
    throw new FormatError(`${key} must be a non-negative integer, got '${raw}'`, format, undefined, lineNumber);
  }
  return Number.parseInt(raw, 10);
}
