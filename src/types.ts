/**
 * Core type definitions shared across readers, writers and the pipeline
 *
 * Format-specific types live next to their parsers (`formats/<format>/types.ts`);
 * this module holds the pieces every format uses.
 */

import { type } from "arktype";

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler (defaults to console.warn) */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE PATHS
// =============================================================================

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File path validation schema
 *
 * Rejects empty paths and paths with NUL bytes; everything else is left to the
 * file system to judge. Valid paths come out branded.
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without NUL characters", actual: "a NUL character" });
  }
  if (path.trim() !== path) {
    return ctx.reject({ expected: "a path without surrounding whitespace" });
  }
  return true;
}).pipe((path) => path as FilePath);

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Maximum file size to prevent memory exhaustion (default: 64MB) */
  readonly maxFileSize?: number;
}

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
});

// =============================================================================
// COLORIMETRY
// =============================================================================

/**
 * CIE L*a*b* triple
 */
export interface LabValue {
  readonly L: number;
  readonly a: number;
  readonly b: number;
}

/**
 * CIE XYZ triple
 */
export interface XyzValue {
  readonly X: number;
  readonly Y: number;
  readonly Z: number;
}

/**
 * Profile connection space of the emitted colorimetric columns
 */
export type PcsType = "XYZ" | "LAB";
