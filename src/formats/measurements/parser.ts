/**
 * Measurement export parser
 *
 * Reads the delimited CSV a spectrophotometer exports (one header row, one row
 * per measured patch) into MeasurementRow records. Column groups are found by
 * header name; values pass through unchanged apart from decimal-comma
 * normalization.
 */

import { FormatError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { LabValue, XyzValue } from "../../types";
import type { FormatDefaults, ParserFormat } from "../abstract-parser";
import { AbstractParser } from "../abstract-parser";
import { parseCSVRow } from "../dsv/state-machine";
import { parseDecimal, splitLogicalLines } from "../dsv/utils";
import { detectColumns } from "./columns";
import type {
  ColumnLayout,
  MeasurementParserOptions,
  MeasurementRow,
  MeasurementSummary,
} from "./types";

/**
 * Streaming parser for measurement CSV exports
 *
 * @example
 * ```typescript
 * const parser = new MeasurementParser({ delimiter: ";" });
 * for await (const row of parser.parseFile("input/patches.csv")) {
 *   console.log(row.index, row.lab);
 * }
 * ```
 */
export class MeasurementParser extends AbstractParser<MeasurementRow, MeasurementParserOptions> {
  constructor(options: MeasurementParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): FormatDefaults<MeasurementParserOptions> {
    return { delimiter: ";" };
  }

  protected getFormatName(): ParserFormat {
    return "CSV";
  }

  /**
   * Parse measurement rows from CSV text
   *
   * @throws {FormatError} On a partial column group, a non-numeric value in a
   * recognized column, or a row with no complete group
   */
  async *parseString(data: string): AsyncIterable<MeasurementRow> {
    let layout: ColumnLayout | undefined;
    let index = 0;

    for (const { text, lineNumber } of splitLogicalLines(data)) {
      this.checkAborted();
      if (text.trim() === "") continue;

      const cells = parseCSVRow(text, this.options.delimiter, '"', '"', lineNumber);
      // Spreadsheets pad re-saved exports with delimiter-only lines
      if (cells.every((cell) => cell.trim() === "")) continue;

      if (layout === undefined) {
        layout = detectColumns(cells, lineNumber, (warning, line) => this.warn(warning, line));
        continue;
      }

      yield this.parseRow(cells, layout, index, lineNumber);
      index++;
    }

    if (layout === undefined) {
      throw this.formatError("CSV file has no header row");
    }
  }

  /**
   * Parse measurement rows from a file
   *
   * @throws {FileError} If the file cannot be read
   * @throws {FormatError} As for parseString, naming the file
   */
  async *parseFile(filePath: string): AsyncIterable<MeasurementRow> {
    const text = await readToString(filePath);
    try {
      yield* this.parseString(text);
    } catch (error) {
      if (error instanceof FormatError) throw error.withFile(filePath);
      throw error;
    }
  }

  private parseRow(
    cells: readonly string[],
    layout: ColumnLayout,
    index: number,
    lineNumber: number
  ): MeasurementRow {
    const labValues = layout.lab && this.readGroup(cells, layout.lab, "Lab", lineNumber);
    const xyzValues = layout.xyz && this.readGroup(cells, layout.xyz, "XYZ", lineNumber);
    const spectral = layout.spectral && this.readGroup(cells, layout.spectral, "spectral", lineNumber);

    const lab = labValues && toLab(labValues);
    const xyz = xyzValues && toXyz(xyzValues);

    if (lab === undefined && xyz === undefined && spectral === undefined) {
      throw this.formatError(
        "Row has no complete Lab, XYZ or spectral values",
        lineNumber,
        cells.join(this.options.delimiter)
      );
    }

    return {
      index,
      lineNumber,
      lab,
      xyz,
      spectral,
      name: textAt(cells, layout.name),
      date: textAt(cells, layout.date),
      testMode: textAt(cells, layout.testMode),
      lightSource: textAt(cells, layout.lightSource),
    };
  }

  /**
   * Read a column group; all values present, or none
   */
  private readGroup(
    cells: readonly string[],
    columns: readonly number[],
    group: string,
    lineNumber: number
  ): number[] | undefined {
    const values: number[] = [];
    let missing = 0;

    for (const column of columns) {
      const raw = cellAt(cells, column) ?? "";
      const value = parseDecimal(raw);
      if (value === null) {
        throw this.formatError(`Non-numeric ${group} value '${raw.trim()}' in column ${column + 1}`, lineNumber);
      }
      if (value === undefined) {
        missing++;
      } else {
        values.push(value);
      }
    }

    if (missing === columns.length) return undefined;
    if (missing > 0) {
      throw this.formatError(
        `Incomplete ${group} values: ${missing} of ${columns.length} missing`,
        lineNumber
      );
    }
    return values;
  }
}

/**
 * Read every row of a measurement CSV into memory
 */
export async function readMeasurements(
  filePath: string,
  options: MeasurementParserOptions = {}
): Promise<MeasurementRow[]> {
  const rows: MeasurementRow[] = [];
  for await (const row of new MeasurementParser(options).parseFile(filePath)) {
    rows.push(row);
  }
  return rows;
}

/**
 * Summarize which column groups a set of rows carries
 *
 * Illuminant and observer come from the first light source cell shaped like
 * `D50/2°` or `D65 / 10`.
 */
export function summarizeMeasurements(rows: readonly MeasurementRow[]): MeasurementSummary {
  let illuminant: string | undefined;
  let observer: number | undefined;

  for (const row of rows) {
    if (row.lightSource === undefined) continue;
    const match = LIGHT_SOURCE_PATTERN.exec(row.lightSource);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      illuminant = match[1].toUpperCase();
      observer = Number.parseInt(match[2], 10);
      break;
    }
  }

  return {
    rowCount: rows.length,
    hasLab: rows.some((row) => row.lab !== undefined),
    hasXyz: rows.some((row) => row.xyz !== undefined),
    hasSpectral: rows.some((row) => row.spectral !== undefined),
    ...(illuminant !== undefined ? { illuminant } : {}),
    ...(observer !== undefined ? { observer } : {}),
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

const LIGHT_SOURCE_PATTERN = /^\s*([A-Za-z0-9]+)\s*\/\s*(\d+)\s*°?/;

function cellAt(cells: readonly string[], column: number | undefined): string | undefined {
  return column === undefined ? undefined : cells[column];
}

// Metadata cell, trimmed; empty cells count as absent
function textAt(cells: readonly string[], column: number | undefined): string | undefined {
  const trimmed = cellAt(cells, column)?.trim();
  return trimmed === "" ? undefined : trimmed;
}

function toLab([L = 0, a = 0, b = 0]: readonly number[]): LabValue {
  return { L, a, b };
}

function toXyz([X = 0, Y = 0, Z = 0]: readonly number[]): XyzValue {
  return { X, Y, Z };
}
