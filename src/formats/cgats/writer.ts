/**
 * CGATS text emission helpers
 */

/**
 * Quote a header value
 */
export function quoteValue(value: string): string {
  return `"${value.replace(/"/g, "'")}"`;
}

/**
 * Format a header keyword line
 */
export function formatKeyword(key: string, value: string, quoted: boolean = true): string {
  return `${key} ${quoted ? quoteValue(value) : value}`;
}

/**
 * Format a CGATS data format block
 */
export function formatDataFormat(fields: readonly string[]): string[] {
  return [
    `NUMBER_OF_FIELDS ${fields.length}`,
    "BEGIN_DATA_FORMAT",
    fields.join(" "),
    "END_DATA_FORMAT",
  ];
}

/**
 * Format a CGATS data block
 */
export function formatDataBlock(rows: readonly (readonly string[])[]): string[] {
  return [
    `NUMBER_OF_SETS ${rows.length}`,
    "BEGIN_DATA",
    ...rows.map((row) => row.join(" ")),
    "END_DATA",
  ];
}
