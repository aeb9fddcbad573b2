/**
 * Spectrophotometer measurement export types
 */

import type { LabValue, ParserOptions, XyzValue } from "../../types";
import type { DelimiterType } from "../dsv/types";

/**
 * Wavelengths (nm) of the spectral bands, in column order
 */
export const SPECTRAL_WAVELENGTHS: readonly number[] = Array.from(
  { length: 31 },
  (_, band) => 400 + band * 10
);

/**
 * One measured patch from the export
 *
 * At least one of `lab`, `xyz` or `spectral` is always present.
 */
export interface MeasurementRow {
  /** Zero-based position among measurement rows */
  readonly index: number;
  /** Line in the source file, for error reporting */
  readonly lineNumber: number;
  readonly lab?: LabValue;
  readonly xyz?: XyzValue;
  /** Reflectance at each of SPECTRAL_WAVELENGTHS, passed through unscaled */
  readonly spectral?: readonly number[];
  readonly name?: string;
  readonly date?: string;
  readonly testMode?: string;
  /** Raw "Light Source/Angle" cell, e.g. `D50/10°` */
  readonly lightSource?: string;
}

/**
 * Column indices of each recognized group
 */
export interface ColumnLayout {
  readonly lab?: readonly [number, number, number];
  readonly xyz?: readonly [number, number, number];
  /** One index per SPECTRAL_WAVELENGTHS entry */
  readonly spectral?: readonly number[];
  readonly name?: number;
  readonly date?: number;
  readonly testMode?: number;
  readonly lightSource?: number;
}

/**
 * Measurement parser options
 */
export interface MeasurementParserOptions extends ParserOptions {
  /** Field delimiter (default `;`) */
  delimiter?: DelimiterType;
}

/**
 * What a set of rows contains, and the measurement conditions they report
 */
export interface MeasurementSummary {
  readonly rowCount: number;
  readonly hasLab: boolean;
  readonly hasXyz: boolean;
  readonly hasSpectral: boolean;
  /** Illuminant code from the light source column, e.g. `D50` */
  readonly illuminant?: string;
  /** Observer angle in degrees (2 or 10) */
  readonly observer?: number;
}
