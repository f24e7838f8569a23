/**
 * Shared types for the filter stages and the co-transduction matcher
 */

import type { FilterStage, PeptideRecord } from "../types";

/**
 * Partition produced by one filter
 */
export interface StagePartition<T> {
  kept: T[];
  removed: T[];
}

/**
 * One removal stage of the cascade
 *
 * `apply` must keep input order and put every item in exactly one of
 * `kept` or `removed`.
 */
export interface StageFilter<T extends PeptideRecord = PeptideRecord> {
  readonly stage: FilterStage;
  /** Human-readable description shown in logs */
  readonly description: string;
  apply(records: readonly T[]): StagePartition<T>;
}

/**
 * Which longer peptides may contain a fragment
 *
 * - `protein`: only peptides sharing a master protein accession
 * - `global`: any longer peptide of the run
 */
export type FragmentScope = "protein" | "global";

export interface FragmentOptions {
  /** @default "protein" */
  scope?: FragmentScope;
  /** Shortest peptide considered for removal. @default 6 */
  minLength?: number;
  /** Longest peptide considered for removal; longer ones still contain others. @default 22 */
  maxLength?: number;
  /**
   * Maximum retention-time difference (minutes) between a fragment and its
   * container. Unset means retention time is not consulted.
   */
  retentionTimeTolerance?: number;
}

export interface CascadeOptions {
  skipContaminantRemoval?: boolean;
  skipFragmentRemoval?: boolean;
  skipDuplicateRemoval?: boolean;
  /** Accession classification tag marking contaminants. @default "sp" */
  contaminantMarker?: string;
  fragment?: FragmentOptions;
}

export interface ClassifyOptions {
  /** Also match the "Protein Accessions" values. @default false */
  searchProteinAccessions?: boolean;
}
