/**
 * DSV Format Type Definitions
 *
 * Types for reading and writing delimiter-separated tables (CSV, TSV).
 */

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "," | "\t" | "|" | ";";

/**
 * One data row of a table
 *
 * `values` maps header names to field text in header order. Maps keep
 * numeric-looking header names ("1", "2") in their source position.
 */
export interface DSVRow {
  readonly lineNumber: number;
  readonly values: ReadonlyMap<string, string>;
}

/**
 * A fully read table
 */
export interface DSVTable {
  readonly headers: readonly string[];
  readonly rows: readonly DSVRow[];
}

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * DSV parser options
 */
export interface DSVParserOptions {
  delimiter?: DelimiterType;
  quote?: string;
  escape?: string;

  // Parsing behavior
  skipEmptyLines?: boolean;

  // Ragged row handling
  raggedRows?: "error" | "pad" | "truncate";

  // Maximum lines a single quoted field can span (default: 100)
  maxFieldLines?: number;
}

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  delimiter?: DelimiterType;
  quote?: string;
}

/**
 * A value the writer knows how to format
 */
export type DSVValue = string | number | boolean | null | undefined;
