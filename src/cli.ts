/**
 * spectro-ti3 command line entry
 *
 * Usage: build-profile [--config <file>] [--no-profile]
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { exitCodeFor, Ti3Error } from "./errors";
import { buildProfileFromFile } from "./pipeline";

const DEFAULT_CONFIG = "profile.config.json";

const USAGE = `Usage: build-profile [options]

Convert a spectrophotometer CSV export and a TI2 chart into a TI3
measurement file, then build an ICC profile with ArgyllCMS colprof.

Options:
  -c, --config <file>  Configuration file (default: ${DEFAULT_CONFIG})
      --no-profile     Write the TI3 only; do not run colprof
  -h, --help           Show this help`;

/**
 * Run the command line tool
 *
 * @param argv - Arguments after the program name
 * @returns Process exit code
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  if (parsed.values.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    await buildProfileFromFile(parsed.values.config, { skipProfiler: parsed.values["no-profile"] });
    return 0;
  } catch (error) {
    console.error(error instanceof Ti3Error ? `Error: ${error.toString()}` : error);
    return exitCodeFor(error);
  }
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      config: { type: "string", short: "c", default: DEFAULT_CONFIG },
      "no-profile": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch (_resolveError) {
    return false;
  }
}

if (invokedDirectly()) {
  process.exitCode = await main();
}
