/**
 * Chart layout (TI2) parser
 *
 * Yields the chart's patches in file order, each carrying its device values
 * and optional SAMPLE_LOC, with the shared chart header attached.
 */

import { FormatError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { FormatDefaults, ParserFormat } from "../abstract-parser";
import { AbstractParser } from "../abstract-parser";
import { parseCgats } from "../cgats/parser";
import type { CgatsTable } from "../cgats/types";
import { chartHeaderFromTable } from "./header";
import type { Chart, ChartHeader, ChartParserOptions, ChartPatch } from "./types";

const NUMERIC_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Streaming parser for Argyll chart files
 *
 * @example
 * ```typescript
 * const parser = new ChartParser();
 * for await (const patch of parser.parseFile("input/chart.ti2")) {
 *   console.log(patch.sampleId, patch.deviceValues);
 * }
 * ```
 */
export class ChartParser extends AbstractParser<ChartPatch, ChartParserOptions> {
  constructor(options: ChartParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): FormatDefaults<ChartParserOptions> {
    return {};
  }

  protected getFormatName(): ParserFormat {
    return "TI2";
  }

  /**
   * Parse chart patches from TI2 text
   *
   * @throws {FormatError} On a malformed header or data row
   */
  async *parseString(data: string): AsyncIterable<ChartPatch> {
    const table = parseCgats(data, "TI2");
    yield* this.parseTable(table, chartHeaderFromTable(table));
  }

  /**
   * Parse chart patches from a file
   *
   * @throws {FileError} If the file cannot be read
   * @throws {FormatError} As for parseString, naming the file
   */
  async *parseFile(filePath: string): AsyncIterable<ChartPatch> {
    const text = await readToString(filePath);
    try {
      yield* this.parseString(text);
    } catch (error) {
      if (error instanceof FormatError) throw error.withFile(filePath);
      throw error;
    }
  }

  /**
   * Turn the rows of an already parsed table into patches
   */
  *parseTable(table: CgatsTable, header: ChartHeader): Generator<ChartPatch> {
    const idColumn = table.fields.indexOf("SAMPLE_ID");
    const locColumn = table.fields.indexOf("SAMPLE_LOC");
    const deviceColumns = header.deviceFields.map((field) => table.fields.indexOf(field));

    for (const [position, row] of table.rows.entries()) {
      this.checkAborted();

      if (row.values.length !== table.fields.length) {
        throw this.formatError(
          `Row has ${row.values.length} values but the data format lists ${table.fields.length} fields`,
          row.lineNumber,
          row.values.join(" ")
        );
      }

      const rawId = row.values[idColumn] ?? "";
      if (!/^\d+$/.test(rawId)) {
        throw this.formatError(`Non-numeric SAMPLE_ID '${rawId}'`, row.lineNumber);
      }
      const sampleId = Number.parseInt(rawId, 10);
      if (sampleId !== position + 1) {
        throw this.formatError(
          `SAMPLE_ID ${sampleId} out of sequence; expected ${position + 1}`,
          row.lineNumber
        );
      }

      const deviceValues = deviceColumns.map((column, channel) => {
        const value = row.values[column] ?? "";
        if (!NUMERIC_TOKEN.test(value)) {
          throw this.formatError(
            `Non-numeric ${header.deviceFields[channel] ?? "device"} value '${value}'`,
            row.lineNumber
          );
        }
        return value;
      });

      const sampleLoc = locColumn === -1 ? undefined : row.values[locColumn];

      yield {
        sampleId,
        deviceValues,
        ...(sampleLoc !== undefined && sampleLoc !== "" ? { sampleLoc } : {}),
        header,
      };
    }
  }
}

/**
 * Read a chart file into memory
 *
 * @throws {FileError} If the file cannot be read
 * @throws {FormatError} If the chart is malformed
 */
export async function readChart(filePath: string, options: ChartParserOptions = {}): Promise<Chart> {
  const text = await readToString(filePath);
  try {
    return readChartString(text, options);
  } catch (error) {
    if (error instanceof FormatError) throw error.withFile(filePath);
    throw error;
  }
}

/**
 * Read a chart from TI2 text
 *
 * @throws {FormatError} If the chart is malformed
 */
export function readChartString(text: string, options: ChartParserOptions = {}): Chart {
  const table = parseCgats(text, "TI2");
  const header = chartHeaderFromTable(table);
  const patches = [...new ChartParser(options).parseTable(table, header)];
  return { header, patches };
}
