/**
 * TI3 measurement file writing
 */

export type {
  MeasurementInfo,
  PairedSample,
  PromotedKeyword,
  SpectralBands,
  Ti3Document,
  Ti3WriterOptions,
} from "./types";
export { formatCgatsDate, Ti3Writer, Ti3WriterOptionsSchema } from "./writer";
