/**
 * Row-level state machine for delimiter-separated text
 *
 * Splits one logical row (which may span physical lines inside quotes) into
 * fields, following RFC 4180 quoting.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState } from "./types";

/**
 * Count quotes that open or close a quoted section
 *
 * Doubled quotes (`""`) are escapes and are not counted.
 */
export function countUnescapedQuotes(line: string, quote: string, escapeChar: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== quote) continue;
    if (escapeChar === quote && line[i + 1] === quote) {
      i++;
    } else {
      count++;
    }
  }
  return count;
}

/**
 * True when every quoted section in `line` is closed
 */
export function hasBalancedQuotes(line: string, quote: string, escapeChar: string): boolean {
  return countUnescapedQuotes(line, quote, escapeChar) % 2 === 0;
}

/**
 * Split a row into fields
 *
 * @param line - One logical row, possibly containing newlines inside quotes
 * @param lineNumber - Source line, used only for error reporting
 */
export function parseRow(
  line: string,
  delimiter: string,
  quote: string,
  escapeChar: string,
  lineNumber?: number
): string[] {
  const fields: string[] = [];
  let current = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    const next = line.charAt(i + 1);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          current = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(current);
          current = "";
          state = CSVParseState.FIELD_START;
        } else {
          current += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote && escapeChar === quote && next === quote) {
          current += quote;
          i++;
        } else if (char === quote) {
          state = CSVParseState.QUOTE_IN_QUOTED;
        } else {
          current += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(current);
          current = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Text after a closing quote: keep it, as spreadsheet exports do
          current += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", lineNumber, fields.length + 1, current);
  }
  if (state !== CSVParseState.FIELD_START || line.endsWith(delimiter)) {
    fields.push(current);
  }

  return fields;
}
