/**
 * Chart layout (TI2) reading
 */

export { chartHeaderFromTable, findDeviceFields, inferColorRep, parseLayout } from "./header";
export { ChartParser, readChart, readChartString } from "./parser";
export type {
  Chart,
  ChartHeader,
  ChartParserOptions,
  ChartPatch,
  IndexOrder,
  LayoutHeaders,
} from "./types";
