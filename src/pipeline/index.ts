/**
 * Pipeline entry points
 *
 * The `…Program` functions are Effect programs needing a
 * {@link TableStorage}; `runPipeline` and `runBulk` provide the Node.js file
 * system and the configured log level and return Promises.
 *
 * @example
 * ```typescript
 * const result = await runPipeline({
 *   input: "runs",
 *   output: "results",
 *   assumeCoTransduced: true,
 * });
 * console.log(result.runs.map((run) => run.summary.remainingCount));
 * ```
 *
 * @module pipeline
 */

import { Cause, Effect, Either, Exit, Layer, Logger, LogLevel } from "effect";
import { OverviewTableStore, UnionTableStore } from "../aggregation/stores";
import type { PipelineError } from "../errors";
import { TableStorage } from "../io/table-storage";
import type { PipelineLogLevel } from "../types";
import { type GroupResult, runBulkGroups } from "./bulk";
import { discoverPeptideFiles } from "./discovery";
import { type PipelineOptions, type ResolvedPipelineOptions, resolvePipelineOptions } from "./options";
import { type PeptideRunResult, runPeptideFileOrSkip, type SkippedFile } from "./run";

export interface PipelineResult {
  readonly runs: readonly PeptideRunResult[];
  /** Files that could not be read as peptide tables */
  readonly skipped: readonly SkippedFile[];
}

const LOG_LEVELS: Record<PipelineLogLevel, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

/**
 * Process every peptide file under the input directory, one at a time
 *
 * A file that is not a readable peptide table is logged and skipped;
 * any other failure stops the run.
 */
export const pipelineProgram = (
  options: ResolvedPipelineOptions
): Effect.Effect<PipelineResult, PipelineError, TableStorage> =>
  Effect.gen(function* () {
    const target = {
      output: options.output,
      union: yield* UnionTableStore.make(options.union),
      overview: yield* OverviewTableStore.make(options.overview),
    };

    const files = yield* discoverPeptideFiles(options.input, options);
    yield* Effect.logInfo(`Found ${files.length} peptide files`);

    const runs: PeptideRunResult[] = [];
    const skipped: SkippedFile[] = [];
    for (const path of files) {
      const outcome = yield* runPeptideFileOrSkip(path, options, target);
      if (Either.isRight(outcome)) {
        runs.push(outcome.right);
      } else {
        skipped.push(outcome.left);
      }
    }

    return { runs, skipped };
  });

export const bulkProgram = (
  options: ResolvedPipelineOptions
): Effect.Effect<GroupResult[], PipelineError, TableStorage> => runBulkGroups(options);

/**
 * Run a program against `storage`, rejecting with the original error
 */
export async function runWithStorage<A>(
  program: Effect.Effect<A, PipelineError, TableStorage>,
  logLevel: PipelineLogLevel,
  storage: Layer.Layer<TableStorage> = TableStorage.Live
): Promise<A> {
  const exit = await Effect.runPromiseExit(
    program.pipe(Logger.withMinimumLogLevel(LOG_LEVELS[logLevel]), Effect.provide(storage))
  );
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Single mode: every `*PeptideGroups.txt` file under `options.input`
 */
export async function runPipeline(
  options: PipelineOptions = {},
  storage?: Layer.Layer<TableStorage>
): Promise<PipelineResult> {
  const resolved = resolvePipelineOptions(options);
  return runWithStorage(pipelineProgram(resolved), resolved.logLevel, storage);
}

/**
 * Bulk mode: every subdirectory of `options.bulkDir` as a group, with
 * patterns from `options.bulkManifest`
 */
export async function runBulk(
  options: PipelineOptions,
  storage?: Layer.Layer<TableStorage>
): Promise<GroupResult[]> {
  const resolved = resolvePipelineOptions(options);
  return runWithStorage(bulkProgram(resolved), resolved.logLevel, storage);
}

export { findManifestEntry, MANIFEST_COLUMNS, parseManifest, runBulkGroups, runGroup } from "./bulk";
export type { GroupResult, ManifestEntry } from "./bulk";
export { discoverPeptideFiles, OUTPUT_DIRECTORIES } from "./discovery";
export {
  DEFAULT_CONCURRENCY,
  PipelineOptionsSchema,
  resolvePipelineOptions,
  toPatternList,
} from "./options";
export type { PipelineOptions, ResolvedPipelineOptions } from "./options";
export {
  FINAL_8_14_TABLE,
  FINAL_TABLE,
  resolvePatterns,
  runPeptideFile,
  runPeptideFileOrSkip,
  tablePath,
  UNKNOWN_ALLELE,
} from "./run";
export type { PeptideRunResult, RunOverrides, RunTarget, SkippedFile } from "./run";
