/**
 * Configuration file schema
 *
 * The configuration is JSON; ArkType validates its shape and rejects unknown
 * keys so a misspelled option is reported instead of silently ignored.
 */

import { type } from "arktype";

const FlagValueSchema = type("string | number");

/**
 * colprof settings as written in the configuration file
 */
export const ProfilerConfigSchema = type({
  "+": "reject",
  "run?": "boolean",
  "quality?": "'l' | 'm' | 'h' | 'u'",
  "b2a?": "'n' | 'l' | 'm' | 'h' | 'u'",
  "illuminant?": "string",
  "observer?": "string",
  "threads?": "number>=1",
  "algorithm?": "string",
  "darkEmphasis?": FlagValueSchema,
  "averageDeviation?": FlagValueSchema,
  "fwa?": "boolean",
  "fwaIlluminant?": "string",
  "gamutMapPerceptual?": "string",
  "gamutMapBoth?": "string",
  "colorimetricSourceForPerceptual?": "boolean",
  "colorimetricSourceForSaturation?": "boolean",
  "sourceGamutFile?": "string",
  "abstractProfiles?": "string",
  "perceptualIntent?": "string",
  "saturationIntent?": "string",
  "viewCondIn?": "string",
  "viewCondOut?": "string",
  "gamutVrml?": "boolean",
  "manufacturer?": "string",
  "model?": "string",
  "copyright?": "string",
  "attributes?": "string",
  "defaultIntent?": "string",
  "totalInkLimit?": FlagValueSchema,
  "blackInkLimit?": FlagValueSchema,
  "blackGeneration?": "string",
  "kLocus?": "string",
  "noDeviceShaper?": "boolean",
  "noGridPosition?": "boolean",
  "noOutputShaper?": "boolean",
  "noEmbedTi3?": "boolean",
  "inputAutoScaleWhitePoint?": "boolean",
  "inputForceAbsolute?": "boolean",
  "inputClipAboveWhitePoint?": "boolean",
  "restrictPositive?": "boolean",
  "whitePointScale?": FlagValueSchema,
}).narrow((profiler, ctx) => {
  if (profiler.threads !== undefined && !Number.isInteger(profiler.threads)) {
    return ctx.reject({
      path: ["threads"],
      expected: "a whole number of threads",
      actual: String(profiler.threads),
    });
  }
  return true;
});

/**
 * Complete configuration file schema
 */
export const ProfileConfigSchema = type({
  "+": "reject",
  inputs: {
    "+": "reject",
    csv: "string>0",
    chart: "string>0",
    "delimiter?": "string",
  },
  outputs: {
    "+": "reject",
    ti3: "string>0",
    "icc?": "string",
    "description?": "string",
  },
  "options?": {
    "+": "reject",
    "deviceClass?": "'OUTPUT' | 'INPUT' | 'DISPLAY'",
    "instrument?": "string",
    "descriptor?": "string",
  },
  "profiler?": ProfilerConfigSchema,
}).narrow((config, ctx) => {
  const delimiter = config.inputs.delimiter;
  if (delimiter !== undefined && delimiter.length !== 1) {
    return ctx.reject({
      path: ["inputs", "delimiter"],
      expected: "a single character",
      actual: JSON.stringify(delimiter),
    });
  }
  return true;
});

/**
 * Configuration file contents after validation
 */
export type ProfileConfigInput = typeof ProfileConfigSchema.infer;
