/**
 * Measurement file (TI3) document model
 */

import type { LabValue, PcsType, XyzValue } from "../../types";

/**
 * One chart patch joined with its measurement
 */
export interface PairedSample {
  /** 1-based; equals the sample's position in the document */
  readonly sampleId: number;
  readonly sampleLoc?: string;
  /** Device values copied from the chart */
  readonly deviceValues: readonly string[];
  readonly xyz?: XyzValue;
  readonly lab?: LabValue;
  readonly spectral?: readonly number[];
}

/**
 * Spectral band layout of the SPEC_ columns
 */
export interface SpectralBands {
  readonly wavelengths: readonly number[];
  readonly startNm: number;
  readonly endNm: number;
}

/**
 * Measurement conditions recorded as header comments
 */
export interface MeasurementInfo {
  /** e.g. `D50` */
  readonly illuminant?: string;
  /** Observer angle in degrees */
  readonly observer?: number;
  /** Instrument description */
  readonly instrument?: string;
}

/**
 * A header keyword carried over from the chart
 */
export interface PromotedKeyword {
  readonly key: string;
  readonly value: string;
  readonly quoted: boolean;
}

/**
 * Everything needed to write one TI3 file
 */
export interface Ti3Document {
  /** Full COLOR_REP tag, e.g. `iRGB_LAB` */
  readonly colorRep: string;
  /** DEVICE_CLASS value, e.g. `OUTPUT` */
  readonly deviceClass: string;
  /** Column names in output order */
  readonly fields: readonly string[];
  readonly deviceFields: readonly string[];
  /** PCS suffix of COLOR_REP */
  readonly pcs: PcsType;
  /** PCS group written as columns; absent for spectral-only data */
  readonly pcsColumns?: PcsType;
  readonly includeSampleLoc: boolean;
  readonly spectral?: SpectralBands;
  readonly keywords: readonly PromotedKeyword[];
  readonly measurementInfo: MeasurementInfo;
  readonly samples: readonly PairedSample[];
}

/**
 * TI3 writer options
 */
export interface Ti3WriterOptions {
  /** DESCRIPTOR value */
  readonly descriptor?: string;
  /** ORIGINATOR value */
  readonly originator?: string;
  /** Timestamp for CREATED (default: now) */
  readonly created?: Date;
}
