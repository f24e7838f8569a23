/**
 * @module formats/dsv/parser
 * @description In-memory DSV (CSV/TSV) table parser
 *
 * Peptide tables are a few thousand rows, so the whole text is parsed at
 * once into a {@link DSVTable}. Quoted fields may span lines.
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { DEFAULT_DELIMITERS, DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import { hasBalancedQuotes, parseRow } from "./state-machine";
import type { DSVParserOptions, DSVRow, DSVTable } from "./types";
import { handleRaggedRow, normalizeLineEndings, removeBOM } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

type ResolvedParserOptions = Required<DSVParserOptions>;

const DEFAULT_PARSER_OPTIONS: ResolvedParserOptions = {
  delimiter: DEFAULT_DELIMITERS.tsv,
  quote: DEFAULT_QUOTE,
  escape: DEFAULT_ESCAPE,
  skipEmptyLines: true,
  raggedRows: "pad",
  maxFieldLines: 100,
};

/**
 * Give repeated header names a numeric suffix ("Area", "Area.1", …)
 */
function dedupeHeaders(headers: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return headers.map((raw) => {
    const header = raw.trim();
    const times = seen.get(header) ?? 0;
    seen.set(header, times + 1);
    return times === 0 ? header : `${header}.${times}`;
  });
}

/**
 * DSVParser - header-first table parser
 *
 * @example
 * ```typescript
 * const table = new DSVParser({ delimiter: "\t" }).parseString(text);
 * table.rows[0]?.values.get("Sequence");
 * ```
 */
export class DSVParser {
  private readonly options: ResolvedParserOptions;

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
  }

  /**
   * Split text into logical rows, joining lines that sit inside quotes
   */
  private *logicalRows(text: string): Generator<{ text: string; lineNumber: number }> {
    const { quote, escape, maxFieldLines, skipEmptyLines } = this.options;
    const lines = normalizeLineEndings(removeBOM(text)).split("\n");

    let pending: string | undefined;
    let startLine = 0;
    let spanned = 0;

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index] ?? "";
      const lineNumber = index + 1;

      if (pending === undefined) {
        if (skipEmptyLines && line.trim() === "") continue;
        pending = line;
        startLine = lineNumber;
        spanned = 1;
      } else {
        pending += `\n${line}`;
        spanned++;
      }

      if (hasBalancedQuotes(pending, quote, escape)) {
        yield { text: pending, lineNumber: startLine };
        pending = undefined;
      } else if (spanned > maxFieldLines) {
        throw new DSVParseError(
          `Quoted field exceeds maximum line limit (${maxFieldLines})`,
          startLine
        );
      }
    }

    if (pending !== undefined) {
      throw new DSVParseError("Unclosed quote at end of input", startLine);
    }
  }

  /**
   * Parse a complete table; the first non-empty row is the header
   *
   * @throws {DSVParseError} on unclosed quotes, oversized fields or ragged rows
   * when `raggedRows` is "error"
   */
  parseString(text: string): DSVTable {
    const { delimiter, quote, escape, raggedRows } = this.options;
    let headers: string[] | undefined;
    const rows: DSVRow[] = [];

    for (const row of this.logicalRows(text)) {
      const fields = parseRow(row.text, delimiter, quote, escape, row.lineNumber);
      for (const field of fields) {
        validateFieldSize(field, row.lineNumber);
      }

      if (headers === undefined) {
        headers = dedupeHeaders(fields);
        continue;
      }

      const fitted = handleRaggedRow(fields, headers.length, raggedRows, row.lineNumber);
      const values = new Map<string, string>();
      headers.forEach((header, column) => {
        values.set(header, fitted[column] ?? "");
      });
      rows.push({ lineNumber: row.lineNumber, values });
    }

    return { headers: headers ?? [], rows };
  }
}

/**
 * CSVParser - comma-delimited convenience parser
 */
export class CSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVParser - tab-delimited convenience parser
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
