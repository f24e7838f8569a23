/**
 * Audit and result tables for peptide records
 */

import type { PeptideRecord } from "../../types";
import { CSVWriter } from "../dsv";
import type { DSVValue } from "../dsv";

/**
 * A column computed from the record rather than copied from the source row
 */
export interface DerivedColumn<T extends PeptideRecord> {
  readonly name: string;
  readonly value: (record: T) => DSVValue;
}

/**
 * Format records as CSV: the source columns in source order, then any
 * derived columns
 *
 * @param headers - source table header; written even when `records` is empty
 */
export function formatPeptideTable<T extends PeptideRecord>(
  headers: readonly string[],
  records: readonly T[],
  derived: readonly DerivedColumn<T>[] = []
): string {
  const columns = [...headers, ...derived.map((column) => column.name)];
  const rows = records.map((record) => {
    const row = new Map<string, DSVValue>(record.extraColumns);
    for (const column of derived) {
      row.set(column.name, column.value(record));
    }
    return row;
  });
  return new CSVWriter().formatTable(columns, rows);
}
