/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) table support
 *
 * @example
 * ```typescript
 * import { CSVWriter, TSVParser } from './formats/dsv';
 *
 * const table = new TSVParser().parseString(text);
 * const csv = new CSVWriter().formatTable(table.headers, table.rows.map((r) => r.values));
 * ```
 */

export type {
  DelimiterType,
  DSVParserOptions,
  DSVRow,
  DSVTable,
  DSVValue,
  DSVWriterOptions,
} from "./types";
export { CSVParseState } from "./types";

export { CSVParser, DSVParser, TSVParser } from "./parser";
export { CSVWriter, DSVWriter } from "./writer";

export { countUnescapedQuotes, hasBalancedQuotes, parseRow } from "./state-machine";
export { handleRaggedRow, normalizeLineEndings, removeBOM } from "./utils";
export { DEFAULT_DELIMITERS, DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
