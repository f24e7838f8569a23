/**
 * Peptide filtering and co-transduction operations
 *
 * @module operations
 */

export { filterPeptides, stageTableNames, CascadeOptionsSchema } from "./cascade";
export { ContaminantFilter, classificationTag, DEFAULT_CONTAMINANT_MARKER } from "./contaminant";
export {
  FragmentFilter,
  FragmentOptionsSchema,
  resolveFragmentOptions,
  DEFAULT_FRAGMENT_OPTIONS,
} from "./fragment";
export { DuplicateFilter } from "./duplicate";
export {
  classify,
  collectMatchGroups,
  findMatchingPattern,
  inferCoTransducedPattern,
  searchableValues,
} from "./cotransduction";
export {
  compileLiteralPattern,
  compilePattern,
  compilePatterns,
  escapeRegExp,
  matchesValue,
  parsePatternList,
  stripChars,
  NO_PATTERNS,
} from "./core/pattern-compiler";
export type { PatternCompilation } from "./core/pattern-compiler";
export { ContainmentIndex } from "./core/containment-index";
export { ExactDeduplicator } from "./core/sequence-deduplicator";
export type {
  CascadeOptions,
  ClassifyOptions,
  FragmentOptions,
  FragmentScope,
  StageFilter,
  StagePartition,
} from "./types";
