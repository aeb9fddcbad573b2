/**
 * Delimited-row tokenizer
 */

export { countUnescapedQuotes, hasBalancedQuotes, parseCSVRow } from "./state-machine";
export type { DelimiterType } from "./types";
export { CSVParseState } from "./types";
export type { LogicalLine } from "./utils";
export { normalizeLineEndings, parseDecimal, removeBOM, splitLogicalLines } from "./utils";
