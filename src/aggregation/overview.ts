/**
 * Per-run overview statistics and the overview table row
 */

import type { DSVValue } from "../formats/dsv";
import type {
  CascadeResult,
  ClassifiedRecord,
  CoTransductionGroup,
  OverviewSummary,
  PeptideRecord,
  RunFileInfo,
} from "../types";

/** Peptide lengths reported in their own overview column */
export const REPORTED_LENGTHS = { min: 7, max: 14 } as const;

/**
 * One overview table row, column name → value
 */
export type OverviewRow = ReadonlyMap<string, DSVValue>;

/**
 * Summarize one run
 *
 * Removed counts come from the cascade; a disabled stage counts 0. The
 * length histogram covers the classified (final) records.
 */
export function summarize(
  run: readonly ClassifiedRecord[],
  cascade: CascadeResult<PeptideRecord>
): OverviewSummary {
  const lengthHistogram: Record<number, number> = {};
  for (const record of run) {
    lengthHistogram[record.length] = (lengthHistogram[record.length] ?? 0) + 1;
  }

  const coTransducedSequences = run
    .filter((record) => record.coTransduced)
    .map((record) => record.sequence);

  return {
    inputCount: cascade.input.length,
    contaminantRemoved: cascade.stage("contaminant").removed.length,
    fragmentRemoved: cascade.stage("fragment").removed.length,
    duplicateRemoved: cascade.stage("duplicate").removed.length,
    remainingCount: run.length,
    coTransducedCount: coTransducedSequences.length,
    coTransducedSequences,
    lengthHistogram,
  };
}

/**
 * Overview table row for a run
 *
 * Column order: run identity, counts, `7mers`…`14mers`, `other_mers`, then
 * one `co-transduced_protein_N` / `co-transduced_peptides_N` pair per match
 * group, numbered from 0.
 */
export function toOverviewRow(
  info: RunFileInfo,
  allele: string,
  summary: OverviewSummary,
  groups: readonly CoTransductionGroup[] = []
): OverviewRow {
  const row = new Map<string, DSVValue>([
    ["file_name", info.fileName],
    ["date_created", info.dateCreated],
    ["HLA_allele", allele],
    ["input_count", summary.inputCount],
    ["sp_count", summary.contaminantRemoved],
    ["fragment_count", summary.fragmentRemoved],
    ["duplicate_count", summary.duplicateRemoved],
    ["total_peptides", summary.remainingCount],
    ["co-transduced_count", summary.coTransducedCount],
  ]);

  let reported = 0;
  for (let length = REPORTED_LENGTHS.min; length <= REPORTED_LENGTHS.max; length++) {
    const count = summary.lengthHistogram[length] ?? 0;
    row.set(`${length}mers`, count);
    reported += count;
  }
  row.set("other_mers", summary.remainingCount - reported);

  groups.forEach((group, index) => {
    row.set(`co-transduced_protein_${index}`, group.protein);
    row.set(`co-transduced_peptides_${index}`, group.sequences.join(", "));
  });

  return row;
}
