/**
 * HLA peptide pipeline - cleanup, co-transduction matching and cross-run
 * aggregation of ProteomeDiscoverer PeptideGroups tables
 */

// Aggregation
export {
  formatUnionTable,
  mergeUnion,
  OverviewTableStore,
  parseUnionTable,
  REPORTED_LENGTHS,
  summarize,
  toOverviewRow,
  UNION_COLUMNS,
  unionColumns,
  UnionTableStore,
} from "./aggregation";
export type { OverviewRow } from "./aggregation";
// Error types
export {
  DSVParseError,
  FileError,
  ParseError,
  PatternCompilationError,
  PeptideFileError,
  PipelineError,
  SchemaMismatchError,
  ValidationError,
} from "./errors";
// Table formats
export { CSVParser, CSVWriter, DSVParser, DSVWriter, TSVParser } from "./formats/dsv";
export type { DSVTable, DSVValue } from "./formats/dsv";
export {
  cleanAnnotatedSequence,
  formatPeptideTable,
  getBaseName,
  inferAllele,
  inferCoTransduced,
  parseRunFileName,
  PeptideGroupsParser,
  splitMultiValue,
} from "./formats/peptide-groups";
export type { DerivedColumn, PeptideTable } from "./formats/peptide-groups";
// Storage
export { createMemoryStorage, TableStorage } from "./io/table-storage";
export type { TableStorageShape } from "./io/table-storage";
// Filtering and matching
export {
  classificationTag,
  classify,
  collectMatchGroups,
  compileLiteralPattern,
  compilePattern,
  compilePatterns,
  ContaminantFilter,
  DuplicateFilter,
  filterPeptides,
  FragmentFilter,
  inferCoTransducedPattern,
  matchesValue,
  parsePatternList,
  stageTableNames,
} from "./operations";
export type {
  CascadeOptions,
  ClassifyOptions,
  FragmentOptions,
  FragmentScope,
  PatternCompilation,
  StageFilter,
} from "./operations";
// Orchestration
export {
  bulkProgram,
  pipelineProgram,
  resolvePipelineOptions,
  runBulk,
  runPeptideFile,
  runPipeline,
  runWithStorage,
} from "./pipeline";
export type {
  GroupResult,
  PeptideRunResult,
  PipelineOptions,
  PipelineResult,
  ResolvedPipelineOptions,
  SkippedFile,
} from "./pipeline";
// Core types
export { FILTER_STAGES, SEPARATOR_CHARS } from "./types";
export type {
  CascadeResult,
  ClassifiedRecord,
  CoTransductionGroup,
  CoTransductionPattern,
  FilterStage,
  FilterStageResult,
  OverviewSummary,
  PeptideRecord,
  PipelineLogLevel,
  RunFileInfo,
  UnionTableEntry,
} from "./types";
