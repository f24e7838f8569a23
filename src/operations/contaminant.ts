/**
 * ContaminantFilter - removes peptides of background ("sp") proteins
 *
 * Accessions carry a classification tag before the first `|`
 * (`sp|P02768|ALBU_HUMAN`). A record is a contaminant when any master
 * accession's tag equals the marker exactly; `spike`, `SP` or `tr|…` do not
 * count.
 */

import type { PeptideRecord } from "../types";
import type { StageFilter, StagePartition } from "./types";

export const DEFAULT_CONTAMINANT_MARKER = "sp";

/**
 * Classification tag of an accession: the text before the first `|`, or
 * the whole accession when it has none
 */
export function classificationTag(accession: string): string {
  const bar = accession.indexOf("|");
  return (bar === -1 ? accession : accession.slice(0, bar)).trim();
}

export class ContaminantFilter<T extends PeptideRecord = PeptideRecord> implements StageFilter<T> {
  readonly stage = "contaminant" as const;
  readonly description: string;

  constructor(private readonly marker: string = DEFAULT_CONTAMINANT_MARKER) {
    this.description = `Remove peptides with a "${marker}" master protein accession`;
  }

  isContaminant(record: PeptideRecord): boolean {
    return record.masterAccessions.some((accession) => classificationTag(accession) === this.marker);
  }

  apply(records: readonly T[]): StagePartition<T> {
    const kept: T[] = [];
    const removed: T[] = [];
    for (const record of records) {
      (this.isContaminant(record) ? removed : kept).push(record);
    }
    return { kept, removed };
  }
}
