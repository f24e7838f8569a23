/**
 * Processing of one PeptideGroups file
 *
 * read → filter (audit tables written per stage) → classify → result
 * tables → overview row → union merge
 *
 * @module pipeline/run
 */

import { basename, join } from "node:path";
import { Effect, Either, Option } from "effect";
import { FileError, PeptideFileError, type PipelineError, toPipelineError } from "../errors";
import { type OverviewRow, summarize, toOverviewRow } from "../aggregation/overview";
import type { OverviewTableStore, UnionTableStore } from "../aggregation/stores";
import { formatPeptideTable, PeptideGroupsParser, parseRunFileName } from "../formats/peptide-groups";
import type { DerivedColumn, PeptideTable } from "../formats/peptide-groups";
import { TableStorage } from "../io/table-storage";
import { filterPeptides } from "../operations/cascade";
import { compileLiteralPattern, compilePatterns } from "../operations/core/pattern-compiler";
import { classify, collectMatchGroups } from "../operations/cotransduction";
import type {
  CascadeResult,
  ClassifiedRecord,
  CoTransductionGroup,
  CoTransductionPattern,
  OverviewSummary,
  PeptideRecord,
  RunFileInfo,
} from "../types";
import type { ResolvedPipelineOptions } from "./options";

export const FINAL_TABLE = "final_peptides";
export const FINAL_8_14_TABLE = "final_peptides_8-14";
export const UNKNOWN_ALLELE = "unknown";

/** Length window of the `final_peptides_8-14` table */
const FINAL_LENGTHS = { min: 8, max: 14 } as const;

/**
 * Where a run writes its tables
 */
export interface RunTarget {
  /** Directory holding the per-table subdirectories */
  readonly output: string;
  readonly union: UnionTableStore;
  readonly overview: OverviewTableStore;
}

/**
 * Per-file values from a bulk manifest
 */
export interface RunOverrides {
  /** Replaces the configured explicit patterns */
  readonly coTransducedPatterns?: readonly string[];
  /** Used when the file name carries no allele */
  readonly allele?: string;
}

export interface PeptideRunResult {
  readonly path: string;
  readonly info: RunFileInfo;
  readonly allele: string;
  readonly cascade: CascadeResult<PeptideRecord>;
  readonly patterns: readonly CoTransductionPattern[];
  readonly classified: readonly ClassifiedRecord[];
  readonly groups: readonly CoTransductionGroup[];
  readonly summary: OverviewSummary;
  readonly overviewRow: OverviewRow;
}

export interface SkippedFile {
  readonly path: string;
  readonly error: PeptideFileError;
}

const RESULT_COLUMNS: readonly DerivedColumn<ClassifiedRecord>[] = [
  { name: "Co-transduced", value: (record) => record.coTransduced },
  { name: "Matched Pattern", value: (record) => record.matchedPattern },
];

/**
 * `<output>/<table>/<base>_<table>.csv`
 */
export function tablePath(output: string, baseName: string, table: string): string {
  return join(output, table, `${baseName}_${table}.csv`);
}

const readPeptideTable = (path: string): Effect.Effect<PeptideTable, PipelineError, TableStorage> =>
  Effect.gen(function* () {
    const storage = yield* TableStorage;
    const text = yield* storage.readText(path);
    if (Option.isNone(text)) {
      return yield* Effect.fail(new FileError(`File path ${path} does not exist`, path, "read"));
    }
    return yield* Effect.try({
      try: () => new PeptideGroupsParser().parseString(text.value, path),
      catch: (error) => toPipelineError(error, path),
    });
  });

/**
 * Allele from the file name, else the manifest, else the configured
 * fallback, else "unknown"
 */
const resolveAllele = (
  info: RunFileInfo,
  options: ResolvedPipelineOptions,
  overrides: RunOverrides
): Effect.Effect<string> => {
  const allele = info.allele ?? overrides.allele ?? options.allele;
  return allele !== undefined
    ? Effect.succeed(allele)
    : Effect.as(Effect.logWarning(`Could not infer HLA allele, using "${UNKNOWN_ALLELE}"`), UNKNOWN_ALLELE);
};

/**
 * Patterns for a run: the inferred one first, then the explicit ones
 *
 * Invalid patterns are logged and left out.
 */
export const resolvePatterns = (
  info: RunFileInfo,
  options: ResolvedPipelineOptions,
  overrides: RunOverrides = {}
): Effect.Effect<CoTransductionPattern[]> =>
  Effect.gen(function* () {
    if (options.skipCoTransduction) {
      return [];
    }

    const patterns: CoTransductionPattern[] = [];
    if (options.assumeCoTransduced) {
      if (info.coTransduced === undefined || info.coTransduced.trim() === "") {
        yield* Effect.logWarning("No co-transduced protein in file name");
      } else {
        patterns.push(compileLiteralPattern(info.coTransduced));
      }
    }

    const explicit = compilePatterns(overrides.coTransducedPatterns ?? options.coTransducedPatterns);
    for (const error of explicit.errors) {
      yield* Effect.logError(error.message);
    }
    patterns.push(...explicit.patterns);
    return patterns;
  });

/**
 * Run one file and record it in the target's overview and union tables
 */
export const runPeptideFile = (
  path: string,
  options: ResolvedPipelineOptions,
  target: RunTarget,
  overrides: RunOverrides = {}
): Effect.Effect<PeptideRunResult, PipelineError, TableStorage> =>
  Effect.gen(function* () {
    const storage = yield* TableStorage;
    const info = parseRunFileName(path);
    const write = (table: string, content: string) =>
      storage.writeText(tablePath(target.output, info.baseName, table), content);

    const table = yield* readPeptideTable(path);
    for (const warning of table.warnings) {
      yield* Effect.logWarning(warning);
    }
    yield* Effect.logInfo(`File contains ${table.records.length} peptides`);

    const allele = yield* resolveAllele(info, options, overrides);

    const cascade = yield* Effect.try({
      try: () => filterPeptides(table.records, options.cascade),
      catch: (error) => toPipelineError(error, path),
    });
    for (const stage of cascade.stages) {
      yield* Effect.logInfo(`Removing ${stage.removed.length} ${stage.stage} peptides`);
      yield* write(stage.removedTable, formatPeptideTable(table.headers, stage.removed));
      yield* write(stage.keptTable, formatPeptideTable(table.headers, stage.kept));
    }
    yield* Effect.logInfo(`There are now ${cascade.kept.length} peptides remaining`);

    const patterns = yield* resolvePatterns(info, options, overrides);
    const classified = classify(cascade.kept, patterns, options.classify);
    const groups = collectMatchGroups(cascade.kept, patterns, options.classify);
    for (const pattern of patterns) {
      const matched = classified.filter((record) => record.matchedPattern === pattern.rawExpression);
      yield* Effect.logInfo(`${pattern.rawExpression} matches ${matched.length} peptides`);
    }

    yield* write(FINAL_TABLE, formatPeptideTable(table.headers, classified, RESULT_COLUMNS));
    yield* write(
      FINAL_8_14_TABLE,
      formatPeptideTable(
        table.headers,
        classified.filter(
          (record) => record.length >= FINAL_LENGTHS.min && record.length <= FINAL_LENGTHS.max
        ),
        RESULT_COLUMNS
      )
    );

    const summary = summarize(classified, cascade);
    const overviewRow = toOverviewRow(info, allele, summary, groups);
    yield* target.overview.append([overviewRow]);
    yield* target.union.merge(classified, allele);

    return { path, info, allele, cascade, patterns, classified, groups, summary, overviewRow };
  }).pipe(Effect.annotateLogs({ file: basename(path) }));

/**
 * {@link runPeptideFile}, logging and skipping a file that is not a
 * readable peptide table
 *
 * Any other failure is passed on.
 */
export const runPeptideFileOrSkip = (
  path: string,
  options: ResolvedPipelineOptions,
  target: RunTarget,
  overrides: RunOverrides = {}
): Effect.Effect<Either.Either<PeptideRunResult, SkippedFile>, PipelineError, TableStorage> =>
  Effect.gen(function* () {
    const outcome = yield* Effect.either(runPeptideFile(path, options, target, overrides));
    if (Either.isRight(outcome)) {
      return Either.right(outcome.right);
    }
    if (outcome.left instanceof PeptideFileError) {
      yield* Effect.logError(outcome.left.message);
      return Either.left({ path, error: outcome.left });
    }
    return yield* Effect.fail(outcome.left);
  });
