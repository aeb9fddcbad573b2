/**
 * SAMPLE_LOC resolution
 *
 * A patch's location label is copied from the chart when it has one, and
 * otherwise computed from the chart's strip layout keywords. Nothing is
 * guessed when neither is available.
 */

import type { ChartPatch, LayoutHeaders } from "../formats/ti2/types";

/**
 * Strip label for a zero-based strip index
 *
 * Bijective base 26: 0 → `A`, 25 → `Z`, 26 → `AA`, 27 → `AB`.
 */
export function stripLabel(strip: number): string {
  let label = "";
  let remaining = strip;
  do {
    label = String.fromCharCode(65 + (remaining % 26)) + label;
    remaining = Math.floor(remaining / 26) - 1;
  } while (remaining >= 0);
  return label;
}

/**
 * Derive the location of the patch at a zero-based position
 *
 * `STRIP_THEN_PATCH` fills a strip of STEPS_IN_PASS patches before moving to
 * the next; `PATCH_THEN_STRIP` steps across PASSES_IN_STRIPS2 strips before
 * moving to the next patch.
 *
 * @returns Label such as `B8`, or undefined when any layout keyword is missing
 */
export function deriveSampleLocation(position: number, layout: LayoutHeaders): string | undefined {
  const { stepsInPass, passesInStrips2, indexOrder } = layout;
  if (stepsInPass === undefined || passesInStrips2 === undefined || indexOrder === undefined) {
    return undefined;
  }

  const strip =
    indexOrder === "STRIP_THEN_PATCH"
      ? Math.floor(position / stepsInPass)
      : position % passesInStrips2;
  const step =
    indexOrder === "STRIP_THEN_PATCH"
      ? position % stepsInPass
      : Math.floor(position / passesInStrips2);

  return `${stripLabel(strip)}${step + 1}`;
}

/**
 * Resolve the location of every patch
 *
 * @returns One label per patch, or undefined when some patch has neither a
 * chart location nor a derivable one (the column is then left out entirely)
 */
export function resolveSampleLocations(
  patches: readonly ChartPatch[],
  layout: LayoutHeaders
): string[] | undefined {
  const locations: string[] = [];
  for (const [position, patch] of patches.entries()) {
    const location = patch.sampleLoc ?? deriveSampleLocation(position, layout);
    if (location === undefined) return undefined;
    locations.push(location);
  }
  return locations;
}
