/**
 * Core type definitions for peptide identification tables
 *
 * A {@link PeptideRecord} is built once per input row and never mutated.
 * Every later step (filtering, classification, aggregation) produces new
 * collections derived from these records.
 */

import { type } from "arktype";

/**
 * One row of a PeptideGroups table
 */
export interface PeptideRecord {
  /** Peptide amino-acid string */
  readonly sequence: string;
  /** Sequence length, or the table's own `length` column when present */
  readonly length: number;
  /** Values of "Master Protein Accessions", split on `;` */
  readonly masterAccessions: readonly string[];
  /** Values of "Master Protein Descriptions", split on `;` */
  readonly masterDescriptions: readonly string[];
  /** Values of "Protein Accessions", split on `;` */
  readonly proteinAccessions: readonly string[];
  /** Retention time in minutes, from the first column whose name starts with "RT" */
  readonly retentionTime?: number;
  /** Every original column, verbatim and in source order */
  readonly extraColumns: ReadonlyMap<string, string>;
  /** Line of the source table this record was read from */
  readonly lineNumber?: number;
}

/**
 * A peptide after co-transduction matching
 */
export interface ClassifiedRecord extends PeptideRecord {
  readonly coTransduced: boolean;
  /** Raw expression of the first pattern that matched, in supplied order */
  readonly matchedPattern?: string;
}

/**
 * The three cascading removal stages, in the order they run
 */
export const FILTER_STAGES = ["contaminant", "fragment", "duplicate"] as const;

export type FilterStage = (typeof FILTER_STAGES)[number];

/**
 * Output of one cascading stage
 *
 * `kept` and `removed` are disjoint, preserve input order, and together
 * equal `input`.
 */
export interface FilterStageResult<T extends PeptideRecord = PeptideRecord> {
  readonly stage: FilterStage;
  /** False when the stage was skipped; then `kept` is `input` and `removed` is empty */
  readonly enabled: boolean;
  readonly input: readonly T[];
  readonly kept: readonly T[];
  readonly removed: readonly T[];
  /** Audit table name for the removed records, e.g. "sp_peptides" */
  readonly removedTable: string;
  /** Audit table name for the cumulative kept set, e.g. "fragRM_spRM_peptides" */
  readonly keptTable: string;
}

/**
 * Result of the full cascade over one run
 */
export interface CascadeResult<T extends PeptideRecord = PeptideRecord> {
  readonly input: readonly T[];
  /** Records surviving every enabled stage */
  readonly kept: readonly T[];
  /** Results of the enabled stages, in fixed stage order */
  readonly stages: readonly FilterStageResult<T>[];
  /** Result for a stage, synthesized as a pass-through when it was disabled */
  stage(name: FilterStage): FilterStageResult<T>;
}

/**
 * Characters whose presence in a pattern makes them significant
 */
export const SEPARATOR_CHARS = [" ", "_", "-"] as const;

export type SeparatorChar = (typeof SEPARATOR_CHARS)[number];

/**
 * A compiled, normalized, fully anchored co-transduction matcher
 */
export interface CoTransductionPattern {
  /** Pattern as the user (or the file name) supplied it, trimmed */
  readonly rawExpression: string;
  /** Separators present in the raw expression; compared literally */
  readonly significantChars: ReadonlySet<SeparatorChar>;
  /** Separators absent from the raw expression; stripped before comparison */
  readonly ignoredChars: ReadonlySet<SeparatorChar>;
  /** `^(?:…)$`, case-insensitive */
  readonly compiledMatcher: RegExp;
  readonly source: "explicit" | "inferred";
}

/**
 * One protein value matched by a pattern, with the peptides it matched
 */
export interface CoTransductionGroup {
  readonly pattern: string;
  /** The accession or description value that matched */
  readonly protein: string;
  /** Distinct matched peptide sequences, sorted */
  readonly sequences: readonly string[];
}

/**
 * Persisted cross-run aggregate row
 *
 * Keyed by allele plus upper-cased sequence. Metadata comes from the first
 * run that contributed the peptide.
 */
export interface UnionTableEntry {
  readonly allele: string;
  readonly sequence: string;
  readonly length: number;
  readonly masterAccessions: string;
  readonly masterDescriptions: string;
  readonly count: number;
}

/**
 * Per-run statistics
 */
export interface OverviewSummary {
  readonly inputCount: number;
  readonly contaminantRemoved: number;
  readonly fragmentRemoved: number;
  readonly duplicateRemoved: number;
  readonly remainingCount: number;
  readonly coTransducedCount: number;
  /** Sequences classified co-transduced, in run order */
  readonly coTransducedSequences: readonly string[];
  /** Peptide length → number of peptides of that length */
  readonly lengthHistogram: Readonly<Record<number, number>>;
}

/**
 * Identity of one run, inferred from its file name
 */
export interface RunFileInfo {
  readonly fileName: string;
  /** File name without `_PeptideGroups.txt` / `.txt` */
  readonly baseName: string;
  readonly dateCreated?: string;
  readonly allele?: string;
  /** Literal co-transduced protein text between the allele and `bRP` */
  readonly coTransduced?: string;
}

/**
 * Log levels accepted by the pipeline options
 */
export type PipelineLogLevel = "debug" | "info" | "warning" | "error" | "none";

export const LogLevelSchema = type("'debug' | 'info' | 'warning' | 'error' | 'none'");

