/**
 * CGATS.17 reading and writing
 */

export { getKeyword, parseCgats } from "./parser";
export { tokenizeCgatsLine } from "./tokenizer";
export type { CgatsKeyword, CgatsRow, CgatsTable, CgatsToken } from "./types";
export { formatDataBlock, formatDataFormat, formatKeyword, quoteValue } from "./writer";
