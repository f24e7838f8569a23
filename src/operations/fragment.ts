/**
 * FragmentFilter - removes peptides contained in a longer peptide
 *
 * A peptide in the [minLength, maxLength] window is a fragment when its
 * sequence is an exact, case-insensitive substring of a strictly longer
 * peptide of the same stage input. With `protein` scope the longer peptide
 * must share a master protein accession; with a retention-time tolerance
 * the two must also elute within it.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { PeptideRecord } from "../types";
import { ContainmentIndex } from "./core/containment-index";
import type { FragmentOptions, FragmentScope, StageFilter, StagePartition } from "./types";

export const DEFAULT_FRAGMENT_OPTIONS = {
  scope: "protein",
  minLength: 6,
  maxLength: 22,
} as const satisfies FragmentOptions;

/**
 * ArkType schema for FragmentOptions validation
 */
export const FragmentOptionsSchema = type({
  "scope?": "'protein' | 'global' | undefined",
  "minLength?": "number.integer>=1 | undefined",
  "maxLength?": "number.integer>=1 | undefined",
  "retentionTimeTolerance?": "number>0 | undefined",
}).narrow((options, ctx) => {
  if (
    options.minLength !== undefined &&
    options.maxLength !== undefined &&
    options.minLength > options.maxLength
  ) {
    return ctx.reject({
      expected: "minLength <= maxLength",
      actual: `minLength ${options.minLength}, maxLength ${options.maxLength}`,
      path: ["minLength"],
    });
  }
  return true;
});

interface ResolvedFragmentOptions {
  readonly scope: FragmentScope;
  readonly minLength: number;
  readonly maxLength: number;
  readonly retentionTimeTolerance: number | undefined;
}

export function resolveFragmentOptions(options: FragmentOptions = {}): ResolvedFragmentOptions {
  const validation = FragmentOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid fragment options: ${validation.summary}`);
  }

  return {
    scope: options.scope ?? DEFAULT_FRAGMENT_OPTIONS.scope,
    minLength: options.minLength ?? DEFAULT_FRAGMENT_OPTIONS.minLength,
    maxLength: options.maxLength ?? DEFAULT_FRAGMENT_OPTIONS.maxLength,
    retentionTimeTolerance: options.retentionTimeTolerance,
  };
}

export class FragmentFilter<T extends PeptideRecord = PeptideRecord> implements StageFilter<T> {
  readonly stage = "fragment" as const;
  readonly description: string;
  private readonly options: ResolvedFragmentOptions;

  constructor(options: FragmentOptions = {}) {
    this.options = resolveFragmentOptions(options);
    this.description =
      `Remove ${this.options.minLength}-${this.options.maxLength}mers contained in a longer peptide` +
      (this.options.scope === "protein" ? " of the same protein" : "");
  }

  apply(records: readonly T[]): StagePartition<T> {
    const index = new ContainmentIndex(records, this.options.scope);
    const kept: T[] = [];
    const removed: T[] = [];
    for (const record of records) {
      (this.isFragment(record, index) ? removed : kept).push(record);
    }
    return { kept, removed };
  }

  private isFragment(record: T, index: ContainmentIndex<T>): boolean {
    const length = record.sequence.length;
    if (length < this.options.minLength || length > this.options.maxLength) {
      return false;
    }

    const tolerance = this.options.retentionTimeTolerance;
    const containers = index.containersOf(record);
    if (tolerance === undefined) {
      return containers.length > 0;
    }

    const retentionTime = record.retentionTime;
    if (retentionTime === undefined) {
      return false;
    }
    return containers.some(
      (container) =>
        container.retentionTime !== undefined &&
        Math.abs(container.retentionTime - retentionTime) < tolerance
    );
  }
}
