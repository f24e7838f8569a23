/**
 * @module formats/dsv/writer
 * @description DSV (CSV/TSV) table formatting
 *
 * Fields are quoted only when they contain the delimiter, the quote
 * character or a line break. Quotes inside a field are doubled.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { DEFAULT_DELIMITERS, DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import type { DSVValue, DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * DSVWriter - formats header + rows into table text
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.csv;
    this.quote = options.quote ?? DEFAULT_QUOTE;
  }

  /**
   * Format a single field with proper escaping
   */
  formatField(value: DSVValue): string {
    if (value === null || value === undefined) return "";

    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) {
      return field;
    }

    const escaped = field.split(this.quote).join(DEFAULT_ESCAPE + this.quote);
    return this.quote + escaped + this.quote;
  }

  /**
   * Format a row of fields
   */
  formatRow(fields: readonly DSVValue[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a table; every row is looked up by the given column names
   *
   * The header is always written; output ends with a newline.
   */
  formatTable(
    columns: readonly string[],
    rows: Iterable<ReadonlyMap<string, DSVValue>>
  ): string {
    const lines = [this.formatRow(columns)];
    for (const row of rows) {
      lines.push(this.formatRow(columns.map((column) => row.get(column))));
    }
    return lines.join("\n") + "\n";
  }
}

/**
 * CSVWriter - Convenience class for CSV files
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}
