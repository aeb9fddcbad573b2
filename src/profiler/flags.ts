/**
 * colprof command line construction
 */

import { extname } from "node:path";
import { splitShellWords } from "./shell-words";
import type { FlagValue, InvocationContext, ProfilerInvocation, ProfilerSettings } from "./types";

/**
 * Executable the invocation runs
 */
export const PROFILER_COMMAND = "colprof";

/**
 * Extensions that mark a `-s` / `-S` value as a file rather than a percentage
 */
export const SOURCE_FILE_EXTENSIONS: readonly string[] = [
  ".icc",
  ".icm",
  ".jpg",
  ".jpeg",
  ".tif",
  ".tiff",
];

/**
 * Build the colprof invocation for a written TI3
 *
 * Flags appear in a fixed order; unset, empty and false settings are
 * omitted. The spectral-only flags (`-f`, `-i`, `-o`) are dropped when the TI3
 * has no spectral data. The last argument is the TI3 path without its
 * extension, as colprof expects.
 *
 * @example
 * ```typescript
 * const invocation = await buildColprofInvocation(settings, {
 *   ti3Path: "output/paper.ti3",
 *   iccPath: "output/paper.icc",
 *   description: "Paper",
 *   hasSpectral: false,
 *   resolveInput: (path) => path,
 *   fileExists: exists,
 * });
 * // invocation.args: ["-v", "-qm", "-bm", "-D", "Paper", "-O", "output/paper.icc", "output/paper"]
 * ```
 */
export async function buildColprofInvocation(
  settings: ProfilerSettings,
  context: InvocationContext
): Promise<ProfilerInvocation> {
  const warn = context.onWarning ?? ((warning: string): void => console.warn(`Warning: ${warning}`));
  const args: string[] = ["-v", `-q${settings.quality}`, `-b${settings.b2a}`];

  const option = (flag: string, value: FlagValue | undefined): void => {
    if (isSet(value)) args.push(flag, String(value));
  };
  const toggle = (flag: string, enabled: boolean | undefined): void => {
    if (enabled === true) args.push(flag);
  };
  const words = (flag: string, value: string | undefined): void => {
    if (isSet(value)) args.push(flag, ...splitShellWords(value));
  };

  option("-a", settings.algorithm);
  option("-V", settings.darkEmphasis);
  option("-r", settings.averageDeviation);

  if (settings.fwa === true && context.hasSpectral) {
    if (isSet(settings.fwaIlluminant)) {
      args.push("-f", settings.fwaIlluminant);
    } else {
      args.push("-f");
    }
  }

  for (const [flag, value] of [
    ["-s", settings.gamutMapPerceptual],
    ["-S", settings.gamutMapBoth],
  ] as const) {
    if (!isSet(value)) continue;
    if (!isSourceFile(value)) {
      args.push(flag, value);
      continue;
    }
    const resolved = context.resolveInput(value);
    if (await context.fileExists(resolved)) {
      args.push(flag, resolved);
    } else {
      warn(`${flag} profile '${resolved}' not found; skipping ${flag}`);
    }
  }

  toggle("-nP", settings.colorimetricSourceForPerceptual);
  toggle("-nS", settings.colorimetricSourceForSaturation);
  option("-g", settings.sourceGamutFile);
  option("-p", settings.abstractProfiles);
  option("-t", settings.perceptualIntent);
  option("-T", settings.saturationIntent);
  option("-c", settings.viewCondIn);
  option("-d", settings.viewCondOut);
  toggle("-P", settings.gamutVrml);
  option("-A", settings.manufacturer);
  option("-M", settings.model);
  option("-C", settings.copyright);
  option("-Z", settings.attributes);
  option("-Z", settings.defaultIntent);
  option("-l", settings.totalInkLimit);
  option("-L", settings.blackInkLimit);
  words("-k", settings.blackGeneration);
  words("-K", settings.kLocus);
  toggle("-ni", settings.noDeviceShaper);
  toggle("-np", settings.noGridPosition);
  toggle("-no", settings.noOutputShaper);
  toggle("-nc", settings.noEmbedTi3);
  toggle("-u", settings.inputAutoScaleWhitePoint);
  toggle("-ua", settings.inputForceAbsolute);
  toggle("-uc", settings.inputClipAboveWhitePoint);
  toggle("-R", settings.restrictPositive);
  option("-U", settings.whitePointScale);

  if (context.hasSpectral) {
    args.push("-i", settings.illuminant, "-o", settings.observer);
  }

  args.push("-D", context.description, "-O", context.iccPath, stripExtension(context.ti3Path));

  return {
    command: PROFILER_COMMAND,
    args,
    env: { OMP_NUM_THREADS: String(settings.threads) },
  };
}

/**
 * Render an invocation for logging
 */
export function formatInvocation(invocation: ProfilerInvocation): string {
  const quote = (arg: string): string => (/[\s"'\\$]/.test(arg) ? `'${arg.replace(/'/g, "'\\''")}'` : arg);
  return [invocation.command, ...invocation.args].map(quote).join(" ");
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function isSet<T extends FlagValue>(value: T | undefined): value is T {
  return value !== undefined && String(value).trim() !== "";
}

function isSourceFile(value: string): boolean {
  return SOURCE_FILE_EXTENSIONS.includes(extname(value).toLowerCase());
}

function stripExtension(path: string): string {
  const extension = extname(path);
  return extension === "" ? path : path.slice(0, -extension.length);
}
