/**
 * Chart layout (TI2) types
 */

import type { CgatsKeyword } from "../cgats/types";
import type { ParserOptions } from "../../types";

/**
 * Patch traversal order across the chart's strips
 */
export type IndexOrder = "STRIP_THEN_PATCH" | "PATCH_THEN_STRIP";

/**
 * Chart geometry keywords used to derive patch locations
 */
export interface LayoutHeaders {
  /** Patches per strip */
  readonly stepsInPass?: number;
  /** Strips per page */
  readonly passesInStrips2?: number;
  readonly indexOrder?: IndexOrder;
}

/**
 * Header information shared by every patch of a chart
 */
export interface ChartHeader {
  /** File identifier, e.g. `CTI2` */
  readonly fileType: string;
  readonly keywords: readonly CgatsKeyword[];
  /** Device space, e.g. `iRGB` */
  readonly colorRep: string;
  /** Whether COLOR_REP came from the file rather than the device fields */
  readonly colorRepDeclared: boolean;
  /** Device channel fields in data format order, e.g. `RGB_R RGB_G RGB_B` */
  readonly deviceFields: readonly string[];
  /** Every field of the data format */
  readonly fields: readonly string[];
  readonly layout: LayoutHeaders;
  readonly declaredSets?: number;
}

/**
 * One printed patch
 */
export interface ChartPatch {
  /** 1-based; equals the patch's position in the file */
  readonly sampleId: number;
  /** Device values as written in the chart, one per device field */
  readonly deviceValues: readonly string[];
  readonly sampleLoc?: string;
  readonly header: ChartHeader;
}

/**
 * A fully read chart
 */
export interface Chart {
  readonly header: ChartHeader;
  readonly patches: readonly ChartPatch[];
}

/**
 * Chart parser options
 */
export type ChartParserOptions = ParserOptions;
