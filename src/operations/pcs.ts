/**
 * PCS column selection
 *
 * Decides once per run, from the rows as a whole, which colorimetric columns
 * the measurement file carries and what COLOR_REP suffix it declares.
 */

import type { MeasurementRow } from "../formats/measurements/types";
import { SPECTRAL_WAVELENGTHS } from "../formats/measurements/types";
import type { PcsType } from "../types";

/**
 * Output column names of each PCS group
 */
export const PCS_FIELDS: Readonly<Record<PcsType, readonly string[]>> = {
  XYZ: ["XYZ_X", "XYZ_Y", "XYZ_Z"],
  LAB: ["LAB_L", "LAB_A", "LAB_B"],
};

/**
 * Result of PCS selection
 */
export interface PcsSelection {
  /** COLOR_REP suffix */
  readonly suffix: PcsType;
  /** Group written as columns; undefined for spectral-only data */
  readonly columns?: PcsType;
  readonly includeSpectral: boolean;
}

/**
 * Select the PCS columns for a set of rows
 *
 * XYZ wins over Lab when both are present. Spectral-only data declares an XYZ
 * suffix with no XYZ columns, which is what colprof expects for spectral
 * input.
 */
export function selectPcs(rows: readonly MeasurementRow[]): PcsSelection {
  const includeSpectral = rows.some((row) => row.spectral !== undefined);

  if (rows.some((row) => row.xyz !== undefined)) {
    return { suffix: "XYZ", columns: "XYZ", includeSpectral };
  }
  if (rows.some((row) => row.lab !== undefined)) {
    return { suffix: "LAB", columns: "LAB", includeSpectral };
  }
  return { suffix: "XYZ", includeSpectral };
}

/**
 * Column names of the spectral bands, `SPEC_400` through `SPEC_700`
 */
export function spectralFields(): string[] {
  return SPECTRAL_WAVELENGTHS.map((wavelength) => `SPEC_${String(wavelength).padStart(3, "0")}`);
}

/**
 * Combine the chart's device space with the PCS suffix
 */
export function composeColorRep(deviceSpace: string, suffix: PcsType): string {
  return `${deviceSpace}_${suffix}`;
}
