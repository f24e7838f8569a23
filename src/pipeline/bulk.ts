/**
 * Bulk mode: one group per subdirectory of the bulk directory
 *
 * Groups run concurrently. Each writes its own union and overview tables;
 * the global tables are updated afterwards, group by group in name order,
 * so their content does not depend on scheduling.
 *
 * @module pipeline/bulk
 */

import { basename, join } from "node:path";
import { Effect, Either, Option } from "effect";
import {
  FileError,
  type PipelineError,
  SchemaMismatchError,
  toPipelineError,
  ValidationError,
} from "../errors";
import { OverviewTableStore, UnionTableStore } from "../aggregation/stores";
import { CSVParser } from "../formats/dsv";
import { TableStorage } from "../io/table-storage";
import { discoverPeptideFiles, OUTPUT_DIRECTORIES } from "./discovery";
import type { ResolvedPipelineOptions } from "./options";
import { toPatternList } from "./options";
import {
  type PeptideRunResult,
  type RunOverrides,
  runPeptideFileOrSkip,
  type SkippedFile,
} from "./run";

export const MANIFEST_COLUMNS = {
  allele: "HLA_allele",
  fileName: "file_name",
  coTransduced: "co-transduced protein(s)",
} as const;

/**
 * One manifest row
 */
export interface ManifestEntry {
  readonly fileName: string;
  readonly allele?: string;
  readonly coTransducedPatterns: readonly string[];
}

export interface GroupResult {
  readonly group: string;
  readonly runs: readonly PeptideRunResult[];
  /** Files that could not be read as peptide tables */
  readonly skipped: readonly SkippedFile[];
}

/**
 * Parse manifest CSV text
 *
 * @throws {SchemaMismatchError} When `file_name` or the co-transduced column is missing
 */
export function parseManifest(text: string, filePath: string): ManifestEntry[] {
  const table = new CSVParser({ raggedRows: "pad" }).parseString(text);
  const missing = [MANIFEST_COLUMNS.fileName, MANIFEST_COLUMNS.coTransduced].filter(
    (column) => !table.headers.includes(column)
  );
  if (missing.length > 0) {
    throw new SchemaMismatchError(filePath, missing, table.headers);
  }

  return table.rows.map((row) => {
    const allele = row.values.get(MANIFEST_COLUMNS.allele)?.trim() ?? "";
    return {
      fileName: row.values.get(MANIFEST_COLUMNS.fileName)?.trim() ?? "",
      allele: allele === "" ? undefined : allele,
      coTransducedPatterns: toPatternList(row.values.get(MANIFEST_COLUMNS.coTransduced)),
    };
  });
}

/**
 * Manifest row for a file, matched on its full path or its file name
 */
export function findManifestEntry(
  entries: readonly ManifestEntry[],
  filePath: string
): ManifestEntry | undefined {
  const name = basename(filePath);
  return (
    entries.find((entry) => entry.fileName === filePath) ??
    entries.find((entry) => basename(entry.fileName) === name)
  );
}

const loadManifest = (path: string): Effect.Effect<ManifestEntry[], PipelineError, TableStorage> =>
  Effect.gen(function* () {
    const storage = yield* TableStorage;
    const text = yield* storage.readText(path);
    if (Option.isNone(text)) {
      return yield* Effect.fail(new FileError(`Bulk manifest ${path} does not exist`, path, "read"));
    }
    return yield* Effect.try({
      try: () => parseManifest(text.value, path),
      catch: (error) => toPipelineError(error, path),
    });
  });

/**
 * Process every file of one group into `<output>/<group>/`
 *
 * A file that is not a peptide table is skipped, as in single mode.
 */
export const runGroup = (
  group: string,
  directory: string,
  manifest: readonly ManifestEntry[],
  options: ResolvedPipelineOptions
): Effect.Effect<GroupResult, PipelineError, TableStorage> =>
  Effect.gen(function* () {
    const output = join(options.output, group);
    const target = {
      output,
      union: yield* UnionTableStore.make(join(output, `${group}_union.csv`)),
      overview: yield* OverviewTableStore.make(join(output, `${group}_overview.csv`)),
    };

    const files = yield* discoverPeptideFiles(directory, options);
    yield* Effect.logInfo(`Processing group with ${files.length} files`);

    const runs: PeptideRunResult[] = [];
    const skipped: SkippedFile[] = [];
    for (const file of files) {
      const entry = findManifestEntry(manifest, file);
      let overrides: RunOverrides = {};
      if (entry === undefined) {
        yield* Effect.logWarning(`${basename(file)} is not listed in the bulk manifest`);
      } else {
        overrides = { coTransducedPatterns: entry.coTransducedPatterns, allele: entry.allele };
      }
      const outcome = yield* runPeptideFileOrSkip(file, options, target, overrides);
      if (Either.isRight(outcome)) {
        runs.push(outcome.right);
      } else {
        skipped.push(outcome.left);
      }
    }

    return { group, runs, skipped };
  }).pipe(Effect.annotateLogs({ group }));

/**
 * Run every group, then fold all runs into the global tables
 */
export const runBulkGroups = (
  options: ResolvedPipelineOptions
): Effect.Effect<GroupResult[], PipelineError, TableStorage> =>
  Effect.gen(function* () {
    if (options.bulk === undefined) {
      return yield* Effect.fail(new ValidationError("Bulk mode needs bulkDir and bulkManifest"));
    }
    const { directory, manifest: manifestPath } = options.bulk;

    const storage = yield* TableStorage;
    const manifest = yield* loadManifest(manifestPath);
    const groups = (yield* storage.listDirectory(directory)).filter(
      (entry) => entry.isDirectory && !entry.name.startsWith(".") && !OUTPUT_DIRECTORIES.has(entry.name)
    );

    const results = yield* Effect.forEach(
      groups,
      (entry) => runGroup(entry.name, entry.path, manifest, options),
      { concurrency: options.concurrency }
    );

    const union = yield* UnionTableStore.make(options.union);
    const overview = yield* OverviewTableStore.make(options.overview);
    for (const result of results) {
      for (const run of result.runs) {
        yield* union.merge(run.classified, run.allele);
      }
      yield* overview.append(result.runs.map((run) => run.overviewRow));
    }
    yield* Effect.logInfo(`Global tables updated from ${results.length} groups`);

    return results;
  });
