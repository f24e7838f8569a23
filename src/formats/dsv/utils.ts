/**
 * DSV Utility Functions Module
 */

import { DSVParseError } from "../../errors";

/**
 * Remove a leading byte order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize line endings to Unix format (LF)
 * Handles Windows (CRLF), Classic Mac (CR), and Unix (LF)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Fit a row to the header width
 *
 * @param handling - "pad" appends empty fields, "truncate" drops extras and
 * pads short rows, "error" rejects any mismatch
 */
export function handleRaggedRow(
  fields: readonly string[],
  expectedColumns: number,
  handling: "error" | "pad" | "truncate",
  lineNumber?: number
): string[] {
  if (fields.length === expectedColumns) {
    return [...fields];
  }

  if (handling === "error" || (handling === "pad" && fields.length > expectedColumns)) {
    throw new DSVParseError(
      `Row has ${fields.length} columns, expected ${expectedColumns}`,
      lineNumber
    );
  }

  const fitted = fields.slice(0, expectedColumns);
  while (fitted.length < expectedColumns) {
    fitted.push("");
  }
  return fitted;
}
