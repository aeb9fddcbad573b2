/**
 * Measurement-to-profile pipeline
 *
 * Reads the measurement CSV and the chart, pairs them, writes the TI3 and,
 * when configured, runs colprof on it. Stages run in order and the first
 * failure stops the run; a profiler failure leaves the written TI3 in place.
 *
 * @module pipeline
 */

import type { Layer } from "effect";
import { Cause, Effect, Exit } from "effect";
import type { ResolvedConfig } from "./config/loader";
import { loadConfig, resolveInputPath } from "./config/loader";
import type { PipelineStage, Ti3Error } from "./errors";
import { ExternalToolError, MissingInputError, PipelineError, toTi3Error } from "./errors";
import type { MeasurementRow, MeasurementSummary } from "./formats/measurements/types";
import { readMeasurements, summarizeMeasurements } from "./formats/measurements/parser";
import type { Chart } from "./formats/ti2/types";
import { readChart } from "./formats/ti2/parser";
import type { Ti3Document } from "./formats/ti3/types";
import { Ti3Writer } from "./formats/ti3/writer";
import { exists } from "./io/file-reader";
import { pairMeasurements } from "./operations/pair";
import { buildColprofInvocation, formatInvocation, PROFILER_COMMAND } from "./profiler/flags";
import { ProfilerService } from "./profiler/service";
import type { ProfilerInvocation, ProfilerResult } from "./profiler/types";

/**
 * Pipeline options
 */
export interface BuildProfileOptions {
  /** Profiler implementation (default: ProfilerService.Live) */
  readonly profilerLayer?: Layer.Layer<ProfilerService>;
  /** Skip colprof even when the configuration enables it */
  readonly skipProfiler?: boolean;
  /** Timestamp for the TI3 CREATED keyword */
  readonly created?: Date;
  readonly signal?: AbortSignal;
  /** Progress messages (default: console.log) */
  readonly onProgress?: (message: string) => void;
  /** Recoverable problems (default: console.warn) */
  readonly onWarning?: (message: string) => void;
}

/**
 * What a pipeline run produced
 */
export interface BuildProfileResult {
  readonly ti3Path: string;
  readonly document: Ti3Document;
  readonly summary: MeasurementSummary;
  /** Present when colprof ran */
  readonly profile?: {
    readonly iccPath: string;
    readonly invocation: ProfilerInvocation;
    readonly result: ProfilerResult;
  };
}

/**
 * Run the pipeline for a configuration file
 *
 * @throws {PipelineError} Naming the failed stage, with the cause attached
 */
export async function buildProfileFromFile(
  configPath: string,
  options: BuildProfileOptions = {}
): Promise<BuildProfileResult> {
  const config = await stage("config", configPath, () => loadConfig(configPath));
  return buildProfile(config, options);
}

/**
 * Run the pipeline for a resolved configuration
 *
 * @throws {PipelineError} Naming the failed stage, with the cause attached
 */
export async function buildProfile(
  config: ResolvedConfig,
  options: BuildProfileOptions = {}
): Promise<BuildProfileResult> {
  const progress = options.onProgress ?? ((message: string): void => console.log(message));
  const warn = options.onWarning ?? ((message: string): void => console.warn(`Warning: ${message}`));
  const parserOptions = {
    onWarning: (warning: string, lineNumber?: number): void =>
      warn(lineNumber !== undefined ? `${warning} (line ${lineNumber})` : warning),
    ...(options.signal !== undefined ? { signal: options.signal } : {}),
  };
  const { inputs, outputs } = config;
  const profilerLayer = options.profilerLayer ?? ProfilerService.Live;
  const runsProfiler = config.profiler.run && options.skipProfiler !== true;

  progress(`CSV: ${inputs.csv}`);
  progress(`TI2: ${inputs.chart}`);
  progress(`TI3 (out): ${outputs.ti3}`);

  if (runsProfiler && !(await profilerAvailable(profilerLayer))) {
    warn(
      `${PROFILER_COMMAND} not found on PATH; the TI3 will be written but profile generation will fail. ` +
        "Install ArgyllCMS or set profiler.run to false"
    );
  }

  const rows = await stage("read-csv", inputs.csv, async (): Promise<MeasurementRow[]> => {
    if (!(await exists(inputs.csv))) throw new MissingInputError(inputs.csv, "csv");
    return readMeasurements(inputs.csv, { ...parserOptions, delimiter: inputs.delimiter });
  });

  const chart = await stage("read-chart", inputs.chart, async (): Promise<Chart> => {
    if (!(await exists(inputs.chart))) throw new MissingInputError(inputs.chart, "chart");
    return readChart(inputs.chart, parserOptions);
  });

  const summary = summarizeMeasurements(rows);
  const document = await stage("pair", inputs.csv, async () =>
    pairMeasurements(rows, chart, {
      deviceClass: config.options.deviceClass,
      ...(config.options.instrument !== undefined ? { instrument: config.options.instrument } : {}),
      ...(summary.illuminant !== undefined ? { illuminant: summary.illuminant } : {}),
      ...(summary.observer !== undefined ? { observer: summary.observer } : {}),
    })
  );

  const writer = new Ti3Writer({
    ...(config.options.descriptor !== undefined ? { descriptor: config.options.descriptor } : {}),
    ...(options.created !== undefined ? { created: options.created } : {}),
  });
  await stage("write-ti3", outputs.ti3, () => writer.writeFile(outputs.ti3, document));
  progress(`Wrote ${outputs.ti3} (${document.samples.length} samples, ${document.colorRep})`);

  if (!runsProfiler) {
    progress("Skipping colprof run");
    return { ti3Path: outputs.ti3, document, summary };
  }

  const invocation = await stage("profile", outputs.ti3, () =>
    buildColprofInvocation(config.profiler, {
      ti3Path: outputs.ti3,
      iccPath: outputs.icc,
      description: outputs.description,
      hasSpectral: document.spectral !== undefined,
      resolveInput: (path) => resolveInputPath(path, config.baseDir),
      fileExists: exists,
      onWarning: warn,
    })
  );
  if (document.spectral === undefined) {
    progress("TI3 has no spectral data; skipping -i/-o/-f spectral flags");
  }
  progress(`> ${formatInvocation(invocation)}`);

  const result = await stage("profile", outputs.ti3, () =>
    runProfiler(invocation, profilerLayer)
  );
  if (result.stdout.trim() !== "") progress(result.stdout.trimEnd());
  if (result.stderr.trim() !== "") progress(result.stderr.trimEnd());
  progress(`Wrote ${outputs.icc}`);

  return {
    ti3Path: outputs.ti3,
    document,
    summary,
    profile: { iccPath: outputs.icc, invocation, result },
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function stage<T>(name: PipelineStage, filePath: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    const cause: Ti3Error | undefined = toTi3Error(error, filePath);
    if (cause === undefined) throw error;
    throw new PipelineError(name, cause);
  }
}

async function profilerAvailable(layer: Layer.Layer<ProfilerService>): Promise<boolean> {
  const program = Effect.gen(function* () {
    const profiler = yield* ProfilerService;
    return yield* profiler.isAvailable(PROFILER_COMMAND);
  });
  return Effect.runPromise(program.pipe(Effect.provide(layer)));
}

async function runProfiler(
  invocation: ProfilerInvocation,
  layer: Layer.Layer<ProfilerService>
): Promise<ProfilerResult> {
  const program = Effect.gen(function* () {
    const profiler = yield* ProfilerService;
    return yield* profiler.run(invocation);
  });

  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(layer)));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  const failure = Cause.squash(exit.cause);
  throw failure instanceof ExternalToolError
    ? failure
    : new ExternalToolError(String(failure), invocation.command, 1);
}
