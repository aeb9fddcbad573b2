/**
 * Delimited-row tokenizer types
 */

/**
 * Field delimiters seen in spectrophotometer exports
 */
export type DelimiterType = ";" | "," | "\t" | "|" | (string & {});

/**
 * Parser state for the row state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}
