/**
 * Lookup of longer peptides that contain a given peptide
 *
 * Peptides are bucketed by master protein accession so that `protein`
 * scope only scans peptides of shared proteins. `global` scope uses a
 * single bucket. Comparisons are on upper-cased sequences.
 *
 * @module operations/core/containment-index
 */

import type { PeptideRecord } from "../../types";
import type { FragmentScope } from "../types";

const GLOBAL_BUCKET = "";

interface IndexedPeptide<T> {
  readonly record: T;
  readonly key: string;
}

export class ContainmentIndex<T extends PeptideRecord = PeptideRecord> {
  private readonly buckets = new Map<string, IndexedPeptide<T>[]>();

  constructor(
    records: readonly T[],
    private readonly scope: FragmentScope
  ) {
    for (const record of records) {
      const entry = { record, key: record.sequence.toUpperCase() };
      for (const bucket of this.bucketsOf(record)) {
        const peptides = this.buckets.get(bucket);
        if (peptides === undefined) {
          this.buckets.set(bucket, [entry]);
        } else {
          peptides.push(entry);
        }
      }
    }

    // Longest first, so callers looking for any container stop early
    for (const peptides of this.buckets.values()) {
      peptides.sort((a, b) => b.key.length - a.key.length);
    }
  }

  /**
   * Strictly longer peptides whose sequence contains `record`'s sequence
   *
   * Each container is reported once even when it shares several accessions.
   */
  containersOf(record: PeptideRecord): T[] {
    const key = record.sequence.toUpperCase();
    const seen = new Set<T>();
    const containers: T[] = [];

    for (const bucket of this.bucketsOf(record)) {
      for (const peptide of this.buckets.get(bucket) ?? []) {
        if (peptide.key.length <= key.length) break;
        if (!seen.has(peptide.record) && peptide.key.includes(key)) {
          seen.add(peptide.record);
          containers.push(peptide.record);
        }
      }
    }

    return containers;
  }

  private bucketsOf(record: PeptideRecord): readonly string[] {
    return this.scope === "global" ? [GLOBAL_BUCKET] : record.masterAccessions;
  }
}
