/**
 * Measurement CSV reading
 */

export { detectColumns, normalizeHeader } from "./columns";
export { MeasurementParser, readMeasurements, summarizeMeasurements } from "./parser";
export type {
  ColumnLayout,
  MeasurementParserOptions,
  MeasurementRow,
  MeasurementSummary,
} from "./types";
export { SPECTRAL_WAVELENGTHS } from "./types";
