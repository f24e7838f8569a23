/**
 * DuplicateFilter - keeps the first occurrence of each peptide sequence
 *
 * Sequences compare case-insensitively. Which copy survives depends only
 * on input order.
 */

import type { PeptideRecord } from "../types";
import { ExactDeduplicator } from "./core/sequence-deduplicator";
import type { StageFilter, StagePartition } from "./types";

export class DuplicateFilter<T extends PeptideRecord = PeptideRecord> implements StageFilter<T> {
  readonly stage = "duplicate" as const;
  readonly description = "Remove repeated peptide sequences, keeping the first";

  apply(records: readonly T[]): StagePartition<T> {
    const deduplicator = new ExactDeduplicator<T>();
    const kept: T[] = [];
    const removed: T[] = [];
    for (const record of records) {
      (deduplicator.isDuplicate(record) ? removed : kept).push(record);
    }
    return { kept, removed };
  }
}
