/**
 * Configuration loading and path resolution
 */

import { dirname, isAbsolute, join, resolve, sep } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import type { ProfilerSettings } from "../profiler/types";
import type { ProfileConfigInput } from "./schema";
import { ProfileConfigSchema } from "./schema";

/**
 * Default colprof settings
 */
export const DEFAULT_PROFILER_SETTINGS: ProfilerSettings = {
  run: true,
  quality: "m",
  b2a: "m",
  illuminant: "D50",
  observer: "1931_2",
  threads: 1,
};

/**
 * Configuration with every path resolved and every default applied
 */
export interface ResolvedConfig {
  readonly configPath: string;
  /** Directory relative paths are resolved against */
  readonly baseDir: string;
  readonly inputs: {
    readonly csv: string;
    readonly chart: string;
    readonly delimiter: string;
  };
  readonly outputs: {
    readonly ti3: string;
    readonly icc: string;
    readonly description: string;
  };
  readonly options: {
    readonly deviceClass: string;
    readonly instrument?: string;
    readonly descriptor?: string;
  };
  readonly profiler: ProfilerSettings;
}

/**
 * Resolve an input path
 *
 * Absolute paths are kept; relative paths with a directory part resolve
 * against the base directory; bare file names are looked up in its `input/`
 * folder.
 *
 * @example
 * ```typescript
 * resolveInputPath("chart.ti2", "/work"); // "/work/input/chart.ti2"
 * resolveInputPath("charts/chart.ti2", "/work"); // "/work/charts/chart.ti2"
 * ```
 */
export function resolveInputPath(path: string, baseDir: string): string {
  return resolveUnder(path, baseDir, "input");
}

/**
 * Resolve an output path; bare file names go to the base directory's
 * `output/` folder
 */
export function resolveOutputPath(path: string, baseDir: string): string {
  return resolveUnder(path, baseDir, "output");
}

/**
 * Load and validate a configuration file
 *
 * @throws {FileError} If the file cannot be read
 * @throws {ValidationError} If it is not valid JSON or fails the schema
 */
export async function loadConfig(configPath: string): Promise<ResolvedConfig> {
  const text = await readToString(configPath);
  return parseConfig(text, resolve(configPath));
}

/**
 * Validate configuration text and resolve it relative to its file
 *
 * @param text - JSON configuration
 * @param configPath - Absolute path the text was read from
 * @throws {ValidationError} If it is not valid JSON or fails the schema
 */
export function parseConfig(text: string, configPath: string): ResolvedConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Configuration ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const config = ProfileConfigSchema(raw);
  if (config instanceof type.errors) {
    throw new ValidationError(`Invalid configuration ${configPath}: ${config.summary}`);
  }

  return resolveConfig(config, configPath);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function resolveConfig(config: ProfileConfigInput, configPath: string): ResolvedConfig {
  const baseDir = dirname(configPath);
  const ti3 = resolveOutputPath(config.outputs.ti3, baseDir);
  const icc = nonEmpty(config.outputs.icc);
  const description = nonEmpty(config.outputs.description);
  const options: NonNullable<ProfileConfigInput["options"]> = config.options ?? {};

  return {
    configPath,
    baseDir,
    inputs: {
      csv: resolveInputPath(config.inputs.csv, baseDir),
      chart: resolveInputPath(config.inputs.chart, baseDir),
      delimiter: config.inputs.delimiter ?? ";",
    },
    outputs: {
      ti3,
      icc: icc !== undefined ? resolveOutputPath(icc, baseDir) : replaceExtension(ti3, ".icc"),
      description: description ?? "profile",
    },
    options: {
      deviceClass: options.deviceClass ?? "OUTPUT",
      ...(nonEmpty(options.instrument) !== undefined ? { instrument: options.instrument } : {}),
      ...(nonEmpty(options.descriptor) !== undefined ? { descriptor: options.descriptor } : {}),
    },
    profiler: { ...DEFAULT_PROFILER_SETTINGS, ...config.profiler },
  };
}

function resolveUnder(path: string, baseDir: string, folder: string): string {
  if (isAbsolute(path)) return path;
  if (path.includes("/") || path.includes(sep)) return resolve(baseDir, path);
  return join(baseDir, folder, path);
}

function replaceExtension(path: string, extension: string): string {
  const dot = path.lastIndexOf(".");
  const slash = Math.max(path.lastIndexOf("/"), path.lastIndexOf(sep));
  return dot > slash ? `${path.slice(0, dot)}${extension}` : `${path}${extension}`;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}
