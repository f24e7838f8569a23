/**
 * Cascading peptide filter
 *
 * Contaminant, fragment and duplicate removal run in that fixed order, each
 * over the previous stage's kept set. Every stage result is retained so the
 * removed records and the cumulative kept set can be written as audit
 * tables.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { CascadeResult, FilterStage, FilterStageResult, PeptideRecord } from "../types";
import { FILTER_STAGES } from "../types";
import { ContaminantFilter, DEFAULT_CONTAMINANT_MARKER } from "./contaminant";
import { DuplicateFilter } from "./duplicate";
import { FragmentFilter, FragmentOptionsSchema } from "./fragment";
import type { CascadeOptions, StageFilter } from "./types";

/**
 * ArkType schema for CascadeOptions validation
 *
 * Keys may be present with an undefined value, as when options are
 * forwarded from the pipeline configuration.
 */
export const CascadeOptionsSchema = type({
  "skipContaminantRemoval?": "boolean | undefined",
  "skipFragmentRemoval?": "boolean | undefined",
  "skipDuplicateRemoval?": "boolean | undefined",
  "contaminantMarker?": "string>0 | undefined",
  "fragment?": FragmentOptionsSchema.or("undefined"),
});

/** Audit table prefix per stage: `sp_peptides`, `fragRM_spRM_peptides`, … */
const TABLE_PREFIX: Record<FilterStage, string> = {
  contaminant: "sp",
  fragment: "frag",
  duplicate: "dup",
};

/**
 * Audit table names for a stage given the stages that ran before it
 *
 * @example
 * ```typescript
 * stageTableNames("fragment", ["contaminant"]);
 * // { removedTable: "frag_peptides", keptTable: "fragRM_spRM_peptides" }
 * ```
 */
export function stageTableNames(
  stage: FilterStage,
  previous: readonly FilterStage[]
): { removedTable: string; keptTable: string } {
  const kept = [stage, ...[...previous].reverse()].map((s) => `${TABLE_PREFIX[s]}RM`);
  return {
    removedTable: `${TABLE_PREFIX[stage]}_peptides`,
    keptTable: `${kept.join("_")}_peptides`,
  };
}

function isEnabled(stage: FilterStage, options: CascadeOptions): boolean {
  switch (stage) {
    case "contaminant":
      return options.skipContaminantRemoval !== true;
    case "fragment":
      return options.skipFragmentRemoval !== true;
    case "duplicate":
      return options.skipDuplicateRemoval !== true;
  }
}

function createFilter<T extends PeptideRecord>(
  stage: FilterStage,
  options: CascadeOptions
): StageFilter<T> {
  switch (stage) {
    case "contaminant":
      return new ContaminantFilter<T>(options.contaminantMarker ?? DEFAULT_CONTAMINANT_MARKER);
    case "fragment":
      return new FragmentFilter<T>(options.fragment);
    case "duplicate":
      return new DuplicateFilter<T>();
  }
}

/**
 * Run the enabled stages over `records`
 *
 * Invariants per stage: `kept` and `removed` are disjoint, keep input order,
 * and together equal the stage input. Each stage's input is the previous
 * enabled stage's `kept`.
 *
 * @throws {ValidationError} When options are invalid
 *
 * @example
 * ```typescript
 * const result = filterPeptides(records, { skipFragmentRemoval: true });
 * result.stage("contaminant").removed; // the "sp" peptides
 * result.kept;                         // the final peptide set
 * ```
 */
export function filterPeptides<T extends PeptideRecord>(
  records: readonly T[],
  options: CascadeOptions = {}
): CascadeResult<T> {
  const validation = CascadeOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid filter options: ${validation.summary}`);
  }

  const stages: FilterStageResult<T>[] = [];
  const ran: FilterStage[] = [];
  let current: readonly T[] = records;

  for (const stage of FILTER_STAGES) {
    if (!isEnabled(stage, options)) continue;

    const { kept, removed } = createFilter<T>(stage, options).apply(current);
    stages.push({
      stage,
      enabled: true,
      input: current,
      kept,
      removed,
      ...stageTableNames(stage, ran),
    });
    ran.push(stage);
    current = kept;
  }

  const kept = current;

  return {
    input: records,
    kept,
    stages,
    stage(name: FilterStage): FilterStageResult<T> {
      const found = stages.find((result) => result.stage === name);
      if (found !== undefined) return found;

      // A disabled stage passes through whatever reached its position
      const position = FILTER_STAGES.indexOf(name);
      const before = stages.filter((result) => FILTER_STAGES.indexOf(result.stage) < position);
      const input = before.at(-1)?.kept ?? records;
      return {
        stage: name,
        enabled: false,
        input,
        kept: input,
        removed: [],
        ...stageTableNames(
          name,
          before.map((result) => result.stage)
        ),
      };
    },
  };
}
