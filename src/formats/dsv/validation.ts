/**
 * @module formats/dsv/validation
 * @description ArkType schemas for DSV parser and writer options
 */

import { type } from "arktype";
import { DSVParseError } from "../../errors";
import { MAX_FIELD_SIZE } from "./constants";

/**
 * Reject fields larger than `maxSize` bytes
 */
export function validateFieldSize(
  field: string,
  lineNumber?: number,
  maxSize: number = MAX_FIELD_SIZE
): void {
  // UTF-16 code units bound the UTF-8 size from below; only measure big fields
  if (field.length * 3 <= maxSize) return;
  const sizeInBytes = Buffer.byteLength(field, "utf8");
  if (sizeInBytes > maxSize) {
    throw new DSVParseError(
      `Field size (${sizeInBytes} bytes) exceeds maximum allowed (${maxSize} bytes)`,
      lineNumber
    );
  }
}

const DelimiterSchema = type.enumerated(",", "\t", "|", ";");

export const DSVParserOptionsSchema = type({
  "delimiter?": DelimiterSchema,
  "quote?": "string",
  "escape?": "string",
  "skipEmptyLines?": "boolean",
  "raggedRows?": "'error' | 'pad' | 'truncate'",
  "maxFieldLines?": "number>0",
}).narrow((options, ctx) => {
  if (options.quote !== undefined && options.quote.length !== 1) {
    return ctx.reject({
      path: ["quote"],
      expected: "single character quote",
      actual: `${options.quote.length} characters`,
    });
  }
  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }
  return true;
});

export const DSVWriterOptionsSchema = type({
  "delimiter?": DelimiterSchema,
  "quote?": "string",
}).narrow((options, ctx) => {
  if (options.quote !== undefined && options.quote.length !== 1) {
    return ctx.reject({
      path: ["quote"],
      expected: "single character quote",
      actual: `${options.quote.length} characters`,
    });
  }
  return true;
});
