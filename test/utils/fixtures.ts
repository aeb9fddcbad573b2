/**
 * Builders for measurement CSV and chart text used across tests
 */

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Fresh temporary directory for one test
 */
export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "spectro-ti3-test-"));
}

/**
 * Semicolon CSV with Name and L*, a*, b* columns, decimal commas
 */
export function labCsv(values: readonly (readonly [number, number, number])[]): string {
  const header = "Name;L*;a*;b*;Light Source/Angle";
  const lines = values.map(
    ([L, a, b], i) => `P${i + 1};${decimalComma(L)};${decimalComma(a)};${decimalComma(b)};D50/2°`
  );
  return [header, ...lines].join("\r\n") + "\r\n";
}

/**
 * Device values for a patch: R tracks the SAMPLE_ID, G and B are fixed
 */
export function deviceValuesFor(sampleId: number): string[] {
  return [`${sampleId}.00`, "50.00", "0.00"];
}

export interface ChartTextOptions {
  readonly patches: number;
  readonly colorRep?: string | null;
  readonly layout?: {
    readonly stepsInPass?: number;
    readonly passesInStrips2?: number;
    readonly indexOrder?: string;
  };
  readonly sampleLocs?: readonly string[];
  readonly extraKeywords?: readonly string[];
}

/**
 * RGB chart in Argyll TI2 layout
 */
export function chartText(options: ChartTextOptions): string {
  const { patches, layout = {}, sampleLocs, extraKeywords = [] } = options;
  const colorRep = options.colorRep === undefined ? "iRGB" : options.colorRep;

  const header = ["CTI2", "", 'DESCRIPTOR "Test chart"', 'ORIGINATOR "tests"'];
  if (colorRep !== null) header.push(`COLOR_REP "${colorRep}"`);
  if (layout.stepsInPass !== undefined) header.push(`STEPS_IN_PASS "${layout.stepsInPass}"`);
  if (layout.passesInStrips2 !== undefined) header.push(`PASSES_IN_STRIPS2 "${layout.passesInStrips2}"`);
  if (layout.indexOrder !== undefined) header.push(`INDEX_ORDER "${layout.indexOrder}"`);
  header.push(...extraKeywords);

  const fields = ["SAMPLE_ID", ...(sampleLocs ? ["SAMPLE_LOC"] : []), "RGB_R", "RGB_G", "RGB_B"];
  const rows = Array.from({ length: patches }, (_, i) => {
    const id = i + 1;
    const loc = sampleLocs ? [`"${sampleLocs[i] ?? ""}"`] : [];
    return [String(id), ...loc, ...deviceValuesFor(id)].join(" ");
  });

  return [
    ...header,
    "",
    `NUMBER_OF_FIELDS ${fields.length}`,
    "BEGIN_DATA_FORMAT",
    fields.join(" "),
    "END_DATA_FORMAT",
    "",
    `NUMBER_OF_SETS ${patches}`,
    "BEGIN_DATA",
    ...rows,
    "END_DATA",
    "",
  ].join("\n");
}

function decimalComma(value: number): string {
  return String(value).replace(".", ",");
}
