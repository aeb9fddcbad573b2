/**
 * Pairing and column selection
 *
 * Joins measurement rows to chart patches by position and assembles the TI3
 * document: column set, COLOR_REP tag, SAMPLE_LOC resolution and the header
 * keywords carried over from the chart. Pure computation; no I/O.
 *
 * @module operations/pair
 */

import { CountMismatchError, FormatError } from "../errors";
import type { MeasurementRow } from "../formats/measurements/types";
import { SPECTRAL_WAVELENGTHS } from "../formats/measurements/types";
import type { PairedSample, PromotedKeyword, Ti3Document } from "../formats/ti3/types";
import type { Chart } from "../formats/ti2/types";
import type { PcsType } from "../types";
import { composeColorRep, PCS_FIELDS, selectPcs, spectralFields } from "./pcs";
import { resolveSampleLocations } from "./sample-loc";

/**
 * Chart keywords copied into the measurement file header
 */
export const PROMOTED_KEYWORDS: readonly string[] = ["COMP_GREY_STEPS", "PAPER_SIZE", "CHART_ID"];

/**
 * Pairing options
 */
export interface PairingOptions {
  /** DEVICE_CLASS value (default `OUTPUT`) */
  readonly deviceClass?: string;
  /** Instrument description recorded in the header */
  readonly instrument?: string;
  /** Illuminant code measured under, e.g. `D50` */
  readonly illuminant?: string;
  /** Observer angle in degrees */
  readonly observer?: number;
}

/**
 * Pair measurement rows with chart patches
 *
 * Row i pairs with the patch whose SAMPLE_ID is i + 1. The PCS columns are
 * chosen once from all rows; every row must then carry the chosen group.
 *
 * @param rows - Measurement rows in export order
 * @param chart - Chart read from the TI2 file
 * @param options - Header values for the document
 * @returns The assembled document
 * @throws {CountMismatchError} If the row and patch counts differ
 * @throws {FormatError} If there is nothing to pair, or a row lacks the
 * selected PCS group or spectral data
 *
 * @example
 * ```typescript
 * const document = pairMeasurements(rows, chart, { deviceClass: "OUTPUT" });
 * console.log(document.colorRep); // "iRGB_LAB"
 * ```
 */
export function pairMeasurements(
  rows: readonly MeasurementRow[],
  chart: Chart,
  options: PairingOptions = {}
): Ti3Document {
  const { header, patches } = chart;

  if (rows.length !== patches.length) {
    throw new CountMismatchError(rows.length, patches.length);
  }
  if (rows.length === 0) {
    throw new FormatError("No measurement rows to pair", "CSV");
  }

  const selection = selectPcs(rows);
  const locations = resolveSampleLocations(patches, header.layout);

  const samples = patches.map((patch, position): PairedSample => {
    const row = rows[position];
    if (row === undefined) {
      throw new CountMismatchError(rows.length, patches.length);
    }
    const location = locations?.[position];

    return {
      sampleId: patch.sampleId,
      ...(location !== undefined ? { sampleLoc: location } : {}),
      deviceValues: patch.deviceValues,
      ...pcsValues(row, selection.columns),
      ...(selection.includeSpectral ? { spectral: requireSpectral(row) } : {}),
    };
  });

  const fields = [
    "SAMPLE_ID",
    ...(locations !== undefined ? ["SAMPLE_LOC"] : []),
    ...header.deviceFields,
    ...(selection.columns !== undefined ? PCS_FIELDS[selection.columns] : []),
    ...(selection.includeSpectral ? spectralFields() : []),
  ];

  return {
    colorRep: composeColorRep(header.colorRep, selection.suffix),
    deviceClass: options.deviceClass ?? "OUTPUT",
    fields,
    deviceFields: header.deviceFields,
    pcs: selection.suffix,
    ...(selection.columns !== undefined ? { pcsColumns: selection.columns } : {}),
    includeSampleLoc: locations !== undefined,
    ...(selection.includeSpectral
      ? {
          spectral: {
            wavelengths: SPECTRAL_WAVELENGTHS,
            startNm: SPECTRAL_WAVELENGTHS[0] ?? 400,
            endNm: SPECTRAL_WAVELENGTHS[SPECTRAL_WAVELENGTHS.length - 1] ?? 700,
          },
        }
      : {}),
    keywords: promoteKeywords(chart),
    measurementInfo: {
      ...(options.illuminant !== undefined ? { illuminant: options.illuminant } : {}),
      ...(options.observer !== undefined ? { observer: options.observer } : {}),
      ...(options.instrument !== undefined ? { instrument: options.instrument } : {}),
    },
    samples,
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function pcsValues(row: MeasurementRow, columns: PcsType | undefined): Pick<PairedSample, "xyz" | "lab"> {
  if (columns === "XYZ") {
    if (row.xyz === undefined) throw missingGroup(row, "XYZ");
    return { xyz: row.xyz };
  }
  if (columns === "LAB") {
    if (row.lab === undefined) throw missingGroup(row, "Lab");
    return { lab: row.lab };
  }
  return {};
}

function requireSpectral(row: MeasurementRow): readonly number[] {
  if (row.spectral === undefined) throw missingGroup(row, "spectral");
  return row.spectral;
}

function missingGroup(row: MeasurementRow, group: string): FormatError {
  return new FormatError(
    `Measurement row ${row.index + 1} has no ${group} values but other rows do`,
    "CSV",
    undefined,
    row.lineNumber
  );
}

function promoteKeywords(chart: Chart): PromotedKeyword[] {
  return chart.header.keywords
    .filter((keyword) => PROMOTED_KEYWORDS.includes(keyword.key))
    .map(({ key, value, quoted }) => ({ key, value, quoted }));
}
