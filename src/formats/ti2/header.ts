/**
 * Chart header interpretation
 */

import { FormatError } from "../../errors";
import { getKeyword } from "../cgats/parser";
import type { CgatsTable } from "../cgats/types";
import type { ChartHeader, IndexOrder, LayoutHeaders } from "./types";

const DEVICE_FIELD = /^(RGB|CMYK|CMY|K|W|GRAY|\d+CLR)_/;

const INDEX_ORDERS: readonly IndexOrder[] = ["STRIP_THEN_PATCH", "PATCH_THEN_STRIP"];

/**
 * Device channel fields of a data format, in order
 */
export function findDeviceFields(fields: readonly string[]): string[] {
  return fields.filter((field) => DEVICE_FIELD.test(field));
}

/**
 * Infer the device space from device field names
 *
 * `RGB_R` gives `iRGB`, `CMYK_C` gives `iCMYK`; gray charts (`GRAY_W`) are
 * `iW`.
 */
export function inferColorRep(deviceFields: readonly string[]): string | undefined {
  const family = DEVICE_FIELD.exec(deviceFields[0] ?? "")?.[1];
  if (family === undefined) return undefined;
  return family === "GRAY" ? "iW" : `i${family}`;
}

/**
 * Interpret the header of a chart table
 *
 * @throws {FormatError} If SAMPLE_ID is missing, a count keyword disagrees
 * with the file, a layout keyword is malformed, or the device space cannot be
 * determined
 */
export function chartHeaderFromTable(table: CgatsTable): ChartHeader {
  if (table.fields.length === 0) {
    throw new FormatError("Chart has no data format block", "TI2");
  }
  if (!table.fields.includes("SAMPLE_ID")) {
    throw new FormatError("Chart data format has no SAMPLE_ID field", "TI2");
  }
  if (table.declaredFields !== undefined && table.declaredFields !== table.fields.length) {
    throw new FormatError(
      `NUMBER_OF_FIELDS is ${table.declaredFields} but the data format lists ${table.fields.length} fields`,
      "TI2"
    );
  }
  if (table.declaredSets !== undefined && table.declaredSets !== table.rows.length) {
    throw new FormatError(
      `NUMBER_OF_SETS is ${table.declaredSets} but the data block has ${table.rows.length} rows`,
      "TI2"
    );
  }

  const deviceFields = findDeviceFields(table.fields);
  const declared = getKeyword(table, "COLOR_REP");
  const colorRep = declared ?? inferColorRep(deviceFields);
  if (colorRep === undefined || colorRep === "") {
    throw new FormatError("Chart has neither COLOR_REP nor device channel fields", "TI2");
  }

  return {
    fileType: table.fileType,
    keywords: table.keywords,
    colorRep,
    colorRepDeclared: declared !== undefined,
    deviceFields,
    fields: table.fields,
    layout: parseLayout(table),
    ...(table.declaredSets !== undefined ? { declaredSets: table.declaredSets } : {}),
  };
}

/**
 * Read STEPS_IN_PASS, PASSES_IN_STRIPS2 and INDEX_ORDER
 */
export function parseLayout(table: CgatsTable): LayoutHeaders {
  const stepsInPass = parsePositive(table, "STEPS_IN_PASS");
  const passesInStrips2 = parsePositive(table, "PASSES_IN_STRIPS2");
  const indexOrder = parseIndexOrder(table);

  return {
    ...(stepsInPass !== undefined ? { stepsInPass } : {}),
    ...(passesInStrips2 !== undefined ? { passesInStrips2 } : {}),
    ...(indexOrder !== undefined ? { indexOrder } : {}),
  };
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function parsePositive(table: CgatsTable, key: string): number | undefined {
  const keyword = table.keywords.find((entry) => entry.key === key);
  if (keyword === undefined) return undefined;

  const value = keyword.value.trim();
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) === 0) {
    throw new FormatError(
      `${key} must be a positive integer, got '${value}'`,
      "TI2",
      undefined,
      keyword.lineNumber
    );
  }
  return Number.parseInt(value, 10);
}

function parseIndexOrder(table: CgatsTable): IndexOrder | undefined {
  const keyword = table.keywords.find((entry) => entry.key === "INDEX_ORDER");
  if (keyword === undefined) return undefined;

  const value = keyword.value.trim().toUpperCase();
  const order = INDEX_ORDERS.find((candidate) => candidate === value);
  if (order === undefined) {
    throw new FormatError(
      `INDEX_ORDER must be ${INDEX_ORDERS.join(" or ")}, got '${keyword.value}'`,
      "TI2",
      undefined,
      keyword.lineNumber
    );
  }
  return order;
}
