/**
 * PeptideGroups table → {@link PeptideRecord}s
 *
 * Only the semantic columns are interpreted. Every original column is kept
 * verbatim in `extraColumns` so audit tables reproduce the input rows.
 */

import { PeptideFileError } from "../../errors";
import type { PeptideRecord } from "../../types";
import { TSVParser } from "../dsv";
import type { DSVRow } from "../dsv";
import { COLUMNS, MULTI_VALUE_SEPARATOR, RETENTION_TIME_PREFIX } from "./constants";

/**
 * A parsed peptide table
 */
export interface PeptideTable {
  readonly headers: readonly string[];
  readonly records: readonly PeptideRecord[];
  /** Missing optional columns and skipped rows */
  readonly warnings: readonly string[];
}

/**
 * Split a multi-valued cell on `;`, trimming and dropping empty values
 */
export function splitMultiValue(cell: string | undefined): string[] {
  if (cell === undefined) return [];
  return cell
    .split(MULTI_VALUE_SEPARATOR)
    .map((value) => value.trim())
    .filter((value) => value !== "");
}

/**
 * Bare sequence from an annotated one: `[K].AAAGSLSR.[T]` → `AAAGSLSR`
 *
 * Values without two dots are returned trimmed.
 */
export function cleanAnnotatedSequence(annotated: string): string {
  const first = annotated.indexOf(".");
  const second = first === -1 ? -1 : annotated.indexOf(".", first + 1);
  if (second === -1) {
    return annotated.trim();
  }
  return annotated.slice(first + 1, second).trim();
}

/**
 * Parses PeptideGroups exports
 *
 * @example
 * ```typescript
 * const { records } = new PeptideGroupsParser().parseString(text, "run_PeptideGroups.txt");
 * ```
 */
export class PeptideGroupsParser {
  private readonly tsv = new TSVParser();

  /**
   * @param filePath - used in error and warning messages only
   * @throws {PeptideFileError} when no sequence column exists or a `length`
   * cell is not an integer
   * @throws {DSVParseError} on malformed quoting
   */
  parseString(text: string, filePath: string): PeptideTable {
    const table = this.tsv.parseString(text);
    const headers = table.headers;
    const warnings: string[] = [];

    const sequenceColumn = headers.includes(COLUMNS.sequence)
      ? COLUMNS.sequence
      : headers.includes(COLUMNS.annotatedSequence)
        ? COLUMNS.annotatedSequence
        : undefined;
    if (sequenceColumn === undefined) {
      throw new PeptideFileError(
        `no "${COLUMNS.sequence}" or "${COLUMNS.annotatedSequence}" column`,
        filePath
      );
    }

    const rtColumn = headers.find((header) => header.startsWith(RETENTION_TIME_PREFIX));
    if (rtColumn === undefined) {
      warnings.push(`${filePath} is missing an RT column`);
    }
    for (const column of [COLUMNS.masterAccessions, COLUMNS.masterDescriptions, COLUMNS.proteinAccessions]) {
      if (!headers.includes(column)) {
        warnings.push(`${filePath} is missing a "${column}" column`);
      }
    }

    const records: PeptideRecord[] = [];
    let skipped = 0;
    for (const row of table.rows) {
      const rawSequence = row.values.get(sequenceColumn) ?? "";
      const sequence =
        sequenceColumn === COLUMNS.annotatedSequence
          ? cleanAnnotatedSequence(rawSequence)
          : rawSequence.trim();
      if (sequence === "") {
        skipped++;
        continue;
      }
      records.push(this.toRecord(row, sequence, rtColumn, filePath));
    }

    if (skipped > 0) {
      warnings.push(`${filePath}: skipped ${skipped} row(s) without a sequence`);
    }

    return { headers, records, warnings };
  }

  private toRecord(
    row: DSVRow,
    sequence: string,
    rtColumn: string | undefined,
    filePath: string
  ): PeptideRecord {
    const { values, lineNumber } = row;
    const retentionTime = rtColumn === undefined ? undefined : parseNumber(values.get(rtColumn));

    return {
      sequence,
      length: this.lengthOf(values, sequence, filePath, lineNumber),
      masterAccessions: splitMultiValue(values.get(COLUMNS.masterAccessions)),
      masterDescriptions: splitMultiValue(values.get(COLUMNS.masterDescriptions)),
      proteinAccessions: splitMultiValue(values.get(COLUMNS.proteinAccessions)),
      ...(retentionTime !== undefined && { retentionTime }),
      extraColumns: values,
      lineNumber,
    };
  }

  private lengthOf(
    values: ReadonlyMap<string, string>,
    sequence: string,
    filePath: string,
    lineNumber: number
  ): number {
    const cell = values.get(COLUMNS.length);
    if (cell === undefined || cell.trim() === "") {
      return sequence.length;
    }
    const length = Number(cell);
    if (!Number.isInteger(length) || length < 0) {
      throw new PeptideFileError(`invalid length "${cell}"`, filePath, lineNumber);
    }
    return length;
  }
}

function parseNumber(cell: string | undefined): number | undefined {
  if (cell === undefined || cell.trim() === "") return undefined;
  const value = Number(cell);
  return Number.isFinite(value) ? value : undefined;
}
