/**
 * Exact, first-occurrence-wins deduplication keyed by upper-cased sequence
 *
 * @module sequence-deduplicator
 */

import type { PeptideRecord } from "../../types";

/**
 * Set-backed deduplicator
 *
 * @example
 * ```typescript
 * const dedup = new ExactDeduplicator();
 * const unique = records.filter((record) => !dedup.isDuplicate(record));
 * ```
 */
export class ExactDeduplicator<T extends PeptideRecord = PeptideRecord> {
  private readonly seen = new Set<string>();

  /**
   * Check a record, recording its key when first seen
   */
  isDuplicate(record: T): boolean {
    const key = record.sequence.toUpperCase();
    if (this.seen.has(key)) {
      return true;
    }
    this.seen.add(key);
    return false;
  }
}
