/**
 * Cross-run union table
 *
 * One entry per (allele, upper-cased sequence). Merging is additive: every
 * observation of a key adds 1 to its count, so merging the same run twice
 * counts its peptides twice.
 */

import { ParseError, SchemaMismatchError } from "../errors";
import { CSVParser, CSVWriter } from "../formats/dsv";
import type { DSVValue } from "../formats/dsv";
import type { PeptideRecord, UnionTableEntry } from "../types";

export const UNION_COLUMNS = {
  allele: "Allele",
  sequence: "Sequence",
  length: "Length",
  masterAccessions: "Master Protein Accessions",
  masterDescriptions: "Master Protein Descriptions",
  count: "Count",
} as const;

const UNION_HEADER = Object.values(UNION_COLUMNS);

const REQUIRED_COLUMNS = [UNION_COLUMNS.allele, UNION_COLUMNS.sequence, UNION_COLUMNS.count];

/** Column names written by earlier versions of the union table */
const LEGACY_COLUMNS: Readonly<Record<string, string>> = {
  sequence: UNION_COLUMNS.sequence,
  HLAP_sequence: UNION_COLUMNS.sequence,
  length: UNION_COLUMNS.length,
  HLAP_length: UNION_COLUMNS.length,
  HLAP_master_accessions: UNION_COLUMNS.masterAccessions,
  HLAP_master_descriptions: UNION_COLUMNS.masterDescriptions,
};

export function unionKey(allele: string, sequence: string): string {
  return `${allele}\u0000${sequence.toUpperCase()}`;
}

/**
 * Fold a run's peptides into the union
 *
 * Existing entries keep their order and first-seen metadata; a hit adds 1
 * to the count. Keys seen for the first time are appended in the order
 * they occur in `records`, with count 1.
 *
 * @example
 * ```typescript
 * const once = mergeUnion([], records, "HLA_A0201");
 * const twice = mergeUnion(once, records, "HLA_A0201");
 * // every count in `twice` is 2
 * ```
 */
export function mergeUnion(
  existing: readonly UnionTableEntry[] | undefined,
  records: readonly PeptideRecord[],
  allele: string
): UnionTableEntry[] {
  const merged = [...(existing ?? [])];
  const positions = new Map<string, number>();
  merged.forEach((entry, position) => {
    const key = unionKey(entry.allele, entry.sequence);
    if (!positions.has(key)) positions.set(key, position);
  });

  for (const record of records) {
    const key = unionKey(allele, record.sequence);
    const position = positions.get(key);
    const entry = position === undefined ? undefined : merged[position];

    if (position !== undefined && entry !== undefined) {
      merged[position] = { ...entry, count: entry.count + 1 };
      continue;
    }

    positions.set(key, merged.length);
    merged.push({
      allele,
      sequence: record.sequence,
      length: record.length,
      masterAccessions: record.masterAccessions.join("; "),
      masterDescriptions: record.masterDescriptions.join("; "),
      count: 1,
    });
  }

  return merged;
}

function parseCount(value: string, filePath: string, lineNumber: number): number {
  const count = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(count) || count < 1) {
    throw new ParseError(`${filePath}: invalid Count '${value}'`, "union", lineNumber);
  }
  return count;
}

/**
 * Read union table CSV text
 *
 * Empty text is an empty union. Legacy column names are renamed; an unnamed
 * leading index column is ignored.
 *
 * @throws {SchemaMismatchError} When Allele, Sequence or Count is missing
 * @throws {ParseError} When a Count is not a positive integer
 */
export function parseUnionTable(text: string, filePath: string): UnionTableEntry[] {
  const table = new CSVParser({ raggedRows: "pad" }).parseString(text);
  if (table.headers.length === 0) {
    return [];
  }

  const rename = (header: string): string => LEGACY_COLUMNS[header] ?? header;
  const headers = table.headers.map(rename);
  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new SchemaMismatchError(filePath, missing, table.headers);
  }

  return table.rows.map((row) => {
    const values = new Map<string, string>();
    for (const [header, value] of row.values) {
      values.set(rename(header), value);
    }
    const get = (column: string): string => values.get(column) ?? "";

    const sequence = get(UNION_COLUMNS.sequence).trim();
    const length = Number(get(UNION_COLUMNS.length).trim());
    return {
      allele: get(UNION_COLUMNS.allele).trim(),
      sequence,
      length: Number.isInteger(length) && length > 0 ? length : sequence.length,
      masterAccessions: get(UNION_COLUMNS.masterAccessions),
      masterDescriptions: get(UNION_COLUMNS.masterDescriptions),
      count: parseCount(get(UNION_COLUMNS.count), filePath, row.lineNumber),
    };
  });
}

export function formatUnionTable(entries: readonly UnionTableEntry[]): string {
  const rows = entries.map(
    (entry) =>
      new Map<string, DSVValue>([
        [UNION_COLUMNS.allele, entry.allele],
        [UNION_COLUMNS.sequence, entry.sequence],
        [UNION_COLUMNS.length, entry.length],
        [UNION_COLUMNS.masterAccessions, entry.masterAccessions],
        [UNION_COLUMNS.masterDescriptions, entry.masterDescriptions],
        [UNION_COLUMNS.count, entry.count],
      ])
  );
  return new CSVWriter().formatTable(UNION_HEADER, rows);
}
