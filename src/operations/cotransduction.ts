/**
 * Co-transduction classification
 *
 * A peptide is co-transduced when any pattern fully matches any single
 * value of its master protein accessions or descriptions (and, when
 * enabled, its protein accessions).
 */

import type {
  ClassifiedRecord,
  CoTransductionGroup,
  CoTransductionPattern,
  PeptideRecord,
} from "../types";
import { inferCoTransduced } from "../formats/peptide-groups/filename";
import { compileLiteralPattern, matchesValue } from "./core/pattern-compiler";
import type { ClassifyOptions } from "./types";

/**
 * Literal pattern for the co-transduced protein named in a run file name
 *
 * @example
 * ```typescript
 * inferCoTransducedPattern("test1_000000_HLA_A010101_HEL_bRP_PeptideGroups.txt")?.rawExpression;
 * // "HEL"
 * ```
 */
export function inferCoTransducedPattern(fileName: string): CoTransductionPattern | undefined {
  const protein = inferCoTransduced(fileName);
  return protein === undefined || protein.trim() === "" ? undefined : compileLiteralPattern(protein);
}

/**
 * Values of a record that patterns are matched against, in search order
 */
export function searchableValues(record: PeptideRecord, options: ClassifyOptions = {}): string[] {
  return [
    ...record.masterAccessions,
    ...record.masterDescriptions,
    ...(options.searchProteinAccessions === true ? record.proteinAccessions : []),
  ];
}

/**
 * First pattern, in supplied order, matching any value of the record
 */
export function findMatchingPattern(
  record: PeptideRecord,
  patterns: readonly CoTransductionPattern[],
  options: ClassifyOptions = {}
): CoTransductionPattern | undefined {
  const values = searchableValues(record, options);
  return patterns.find((pattern) => values.some((value) => matchesValue(pattern, value)));
}

/**
 * Classify every record
 *
 * Output order and length equal the input's. With no patterns every record
 * is classified as not co-transduced.
 */
export function classify<T extends PeptideRecord>(
  records: readonly T[],
  patterns: readonly CoTransductionPattern[],
  options: ClassifyOptions = {}
): (T & ClassifiedRecord)[] {
  return records.map((record) => {
    const match = findMatchingPattern(record, patterns, options);
    return match === undefined
      ? { ...record, coTransduced: false }
      : { ...record, coTransduced: true, matchedPattern: match.rawExpression };
  });
}

/**
 * Group matched peptides by pattern and matching protein value
 *
 * Groups come pattern by pattern in supplied order; within a pattern,
 * values appear in the order first matched. Sequences are distinct and
 * sorted.
 */
export function collectMatchGroups(
  records: readonly PeptideRecord[],
  patterns: readonly CoTransductionPattern[],
  options: ClassifyOptions = {}
): CoTransductionGroup[] {
  const groups: CoTransductionGroup[] = [];

  for (const pattern of patterns) {
    const byProtein = new Map<string, Set<string>>();
    for (const record of records) {
      for (const value of searchableValues(record, options)) {
        if (!matchesValue(pattern, value)) continue;
        const sequences = byProtein.get(value) ?? new Set<string>();
        sequences.add(record.sequence);
        byProtein.set(value, sequences);
      }
    }

    for (const [protein, sequences] of byProtein) {
      groups.push({
        pattern: pattern.rawExpression,
        protein,
        sequences: [...sequences].sort(),
      });
    }
  }

  return groups;
}
