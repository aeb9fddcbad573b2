/**
 * spectro-ti3 - spectrophotometer measurements to ArgyllCMS TI3 and ICC
 *
 * Pairs a measurement CSV export with the TI2 chart it was measured from,
 * writes the CGATS TI3 file colprof reads, and can run colprof on it.
 */

// Error types
export {
  CountMismatchError,
  ExternalToolError,
  exitCodeFor,
  FileError,
  FormatError,
  MissingInputError,
  PipelineError,
  type PipelineStage,
  Ti3Error,
  ValidationError,
} from "./errors";
// Shared types
export type { FilePath, LabValue, ParserOptions, PcsType, XyzValue } from "./types";
// CGATS
export { getKeyword, parseCgats, tokenizeCgatsLine, type CgatsTable } from "./formats/cgats";
// Measurement CSV
export {
  MeasurementParser,
  type MeasurementRow,
  type MeasurementSummary,
  readMeasurements,
  SPECTRAL_WAVELENGTHS,
  summarizeMeasurements,
} from "./formats/measurements";
// Chart (TI2)
export {
  type Chart,
  type ChartHeader,
  ChartParser,
  type ChartPatch,
  type LayoutHeaders,
  readChart,
  readChartString,
} from "./formats/ti2";
// TI3
export {
  formatCgatsDate,
  type PairedSample,
  type Ti3Document,
  Ti3Writer,
  type Ti3WriterOptions,
} from "./formats/ti3";
// Pairing
export { pairMeasurements, type PairingOptions, PROMOTED_KEYWORDS } from "./operations/pair";
export { composeColorRep, PCS_FIELDS, type PcsSelection, selectPcs } from "./operations/pcs";
export { deriveSampleLocation, resolveSampleLocations, stripLabel } from "./operations/sample-loc";
// Profiling
export {
  buildColprofInvocation,
  formatInvocation,
  type InvocationContext,
  type ProfilerInvocation,
  type ProfilerResult,
  ProfilerService,
  type ProfilerSettings,
} from "./profiler";
// Configuration
export {
  loadConfig,
  parseConfig,
  type ResolvedConfig,
  resolveInputPath,
  resolveOutputPath,
} from "./config";
// Pipeline
export {
  type BuildProfileOptions,
  type BuildProfileResult,
  buildProfile,
  buildProfileFromFile,
} from "./pipeline";
