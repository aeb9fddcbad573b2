/**
 * CGATS.17 text format types
 *
 * CGATS files (Argyll `.ti1`, `.ti2`, `.ti3`) are a file identifier line,
 * keyword/value header lines, a data format block naming the columns, and a
 * whitespace-separated data block.
 */

/**
 * A lexical token on a CGATS line
 */
export interface CgatsToken {
  readonly text: string;
  /** The token was written in double quotes */
  readonly quoted: boolean;
}

/**
 * A header keyword and its value
 */
export interface CgatsKeyword {
  readonly key: string;
  readonly value: string;
  readonly quoted: boolean;
  readonly lineNumber: number;
}

/**
 * One line of the data block
 */
export interface CgatsRow {
  readonly values: readonly string[];
  readonly lineNumber: number;
}

/**
 * The first table of a CGATS file
 */
export interface CgatsTable {
  /** File identifier from the first line, e.g. `CTI2` */
  readonly fileType: string;
  /** Header keywords in file order */
  readonly keywords: readonly CgatsKeyword[];
  /** Names declared with `KEYWORD` */
  readonly declaredKeywords: readonly string[];
  /** Column names from the data format block */
  readonly fields: readonly string[];
  /** Value of `NUMBER_OF_FIELDS`, when present */
  readonly declaredFields?: number;
  /** Value of `NUMBER_OF_SETS`, when present */
  readonly declaredSets?: number;
  readonly rows: readonly CgatsRow[];
}
