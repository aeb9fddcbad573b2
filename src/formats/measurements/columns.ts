/**
 * Header recognition for measurement exports
 */

import { FormatError } from "../../errors";
import type { ColumnLayout } from "./types";
import { SPECTRAL_WAVELENGTHS } from "./types";

const LAB_ALIASES = {
  L: ["l", "lstar"],
  a: ["a", "astar"],
  b: ["b", "bstar"],
} as const;

const XYZ_ALIASES = {
  X: ["x"],
  Y: ["y"],
  Z: ["z"],
} as const;

const METADATA_COLUMNS = {
  name: "name",
  date: "date",
  testMode: "testmode",
  lightSource: "lightsourceangle",
} as const;

const SPECTRAL_HEADER = /(\d{3})(?:nm)?$/;

/**
 * Normalize a header cell for matching
 *
 * Lowercases and keeps only `[a-z0-9_]`, so `L*`, `Light Source/Angle` and
 * `400 nm` become `l`, `lightsourceangle` and `400nm`.
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[^a-z0-9_]+/g, "");
}

/**
 * Locate the Lab, XYZ, spectral and metadata columns in a header row
 *
 * @param headers - Header cells
 * @param lineNumber - Line of the header row
 * @param onWarning - Receives notes about ignored columns
 * @throws {FormatError} If a group is only partially present, or no
 * photometric group is present at all
 */
export function detectColumns(
  headers: readonly string[],
  lineNumber: number,
  onWarning: (warning: string, lineNumber?: number) => void = () => undefined
): ColumnLayout {
  const positions = new Map<string, number>();
  headers.forEach((header, column) => {
    const key = normalizeHeader(header);
    if (key === "") return;
    if (positions.has(key)) {
      onWarning(`Duplicate column '${header.trim()}' ignored`, lineNumber);
      return;
    }
    positions.set(key, column);
  });

  const find = (aliases: readonly string[]): number | undefined => {
    for (const alias of aliases) {
      const column = positions.get(alias);
      if (column !== undefined) return column;
    }
    return undefined;
  };

  const lab = resolveTriple("Lab", LAB_ALIASES, find, lineNumber);
  const xyz = resolveTriple("XYZ", XYZ_ALIASES, find, lineNumber);
  const spectral = resolveSpectral(positions, lineNumber, onWarning);

  if (lab === undefined && xyz === undefined && spectral === undefined) {
    throw new FormatError(
      "Header has no Lab, XYZ or spectral columns",
      "CSV",
      undefined,
      lineNumber,
      headers.join(" | ")
    );
  }

  return {
    lab,
    xyz,
    spectral,
    name: positions.get(METADATA_COLUMNS.name),
    date: positions.get(METADATA_COLUMNS.date),
    testMode: positions.get(METADATA_COLUMNS.testMode),
    lightSource: positions.get(METADATA_COLUMNS.lightSource),
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function resolveTriple(
  group: string,
  aliases: Readonly<Record<string, readonly string[]>>,
  find: (aliases: readonly string[]) => number | undefined,
  lineNumber: number
): readonly [number, number, number] | undefined {
  const names = Object.keys(aliases);
  const columns = names.map((name) => find(aliases[name] ?? []));
  const found = names.filter((_, i) => columns[i] !== undefined);

  if (found.length === 0) return undefined;

  const [first, second, third] = columns;
  if (first === undefined || second === undefined || third === undefined) {
    const missing = names.filter((_, i) => columns[i] === undefined);
    throw new FormatError(
      `Incomplete ${group} column group: found ${found.join(", ")} but missing ${missing.join(", ")}`,
      "CSV",
      undefined,
      lineNumber
    );
  }
  return [first, second, third];
}

function resolveSpectral(
  positions: ReadonlyMap<string, number>,
  lineNumber: number,
  onWarning: (warning: string, lineNumber?: number) => void
): number[] | undefined {
  const byWavelength = new Map<number, number>();

  for (const [key, column] of positions) {
    const match = SPECTRAL_HEADER.exec(key);
    if (match?.[1] === undefined) continue;

    const wavelength = Number.parseInt(match[1], 10);
    if (!SPECTRAL_WAVELENGTHS.includes(wavelength)) {
      onWarning(`Spectral column '${key}' is outside 400-700nm at 10nm steps and is ignored`, lineNumber);
      continue;
    }
    if (!byWavelength.has(wavelength)) {
      byWavelength.set(wavelength, column);
    }
  }

  if (byWavelength.size === 0) return undefined;

  const columns: number[] = [];
  const missing: number[] = [];
  for (const wavelength of SPECTRAL_WAVELENGTHS) {
    const column = byWavelength.get(wavelength);
    if (column === undefined) {
      missing.push(wavelength);
    } else {
      columns.push(column);
    }
  }

  if (missing.length > 0) {
    throw new FormatError(
      `Incomplete spectral column group: missing ${missing.map((wl) => `${wl}nm`).join(", ")}`,
      "CSV",
      undefined,
      lineNumber
    );
  }

  return columns;
}
