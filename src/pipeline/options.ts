/**
 * Pipeline configuration
 *
 * Options arrive as a plain object (from code or a config file), are
 * validated once with arktype, and resolved into a fully-defaulted
 * {@link ResolvedPipelineOptions} that the rest of the pipeline reads.
 */

import { join } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import { parsePatternList } from "../operations/core/pattern-compiler";
import { FragmentOptionsSchema } from "../operations/fragment";
import type { CascadeOptions, ClassifyOptions } from "../operations/types";
import { LogLevelSchema } from "../types";
import type { PipelineLogLevel } from "../types";

export const DEFAULT_INPUT_DIRECTORY = "hla_files";
export const DEFAULT_OUTPUT_DIRECTORY = "hla_files";
export const DEFAULT_UNION_FILE = "union_table.csv";
export const DEFAULT_OVERVIEW_FILE = "final_table.csv";
export const DEFAULT_CONCURRENCY = 4;

export interface PipelineOptions extends CascadeOptions, ClassifyOptions {
  /** Directory searched for `*PeptideGroups.txt` files. @default "hla_files" */
  input?: string;
  /** Root of every output table. @default "hla_files" */
  output?: string;
  /** @default "<output>/union_table.csv" */
  union?: string;
  /** @default "<output>/final_table.csv" */
  overview?: string;
  /** Bulk mode: directory whose subdirectories are processed as groups */
  bulkDir?: string;
  /** Bulk mode: CSV naming each file's co-transduced protein(s) */
  bulkManifest?: string;

  /** Skip co-transduction matching; every peptide is then not co-transduced */
  skipCoTransduction?: boolean;
  /** Derive one literal pattern from each file name */
  assumeCoTransduced?: boolean;
  /** Comma-separated string or list of regular expressions; "none" means none */
  coTransducedPatterns?: string | readonly string[];
  /** Allele used when the file name does not carry one */
  allele?: string;
  /** Process every file found, not only `*PeptideGroups.txt`. @default false */
  includeAllFiles?: boolean;

  /** @default "info" */
  logLevel?: PipelineLogLevel;
  /** Bulk groups processed at once. @default 4 */
  concurrency?: number;
}

/**
 * Keys may be present with an undefined value, as when options are built
 * from optional CLI or config fields.
 */
export const PipelineOptionsSchema = type({
  "input?": "string>0 | undefined",
  "output?": "string>0 | undefined",
  "union?": "string>0 | undefined",
  "overview?": "string>0 | undefined",
  "bulkDir?": "string>0 | undefined",
  "bulkManifest?": "string>0 | undefined",
  "skipContaminantRemoval?": "boolean | undefined",
  "skipFragmentRemoval?": "boolean | undefined",
  "skipDuplicateRemoval?": "boolean | undefined",
  "skipCoTransduction?": "boolean | undefined",
  "assumeCoTransduced?": "boolean | undefined",
  "coTransducedPatterns?": "string | string[] | undefined",
  "contaminantMarker?": "string>0 | undefined",
  "fragment?": FragmentOptionsSchema.or("undefined"),
  "searchProteinAccessions?": "boolean | undefined",
  "allele?": "string>0 | undefined",
  "includeAllFiles?": "boolean | undefined",
  "logLevel?": LogLevelSchema.or("undefined"),
  "concurrency?": "number.integer>=1 | undefined",
}).narrow((options, ctx) => {
  if ((options.bulkDir === undefined) !== (options.bulkManifest === undefined)) {
    return ctx.reject({
      expected: "bulkDir and bulkManifest together",
      actual: options.bulkDir === undefined ? "bulkManifest only" : "bulkDir only",
      path: [options.bulkDir === undefined ? "bulkDir" : "bulkManifest"],
    });
  }
  return true;
});

export interface ResolvedPipelineOptions {
  readonly input: string;
  readonly output: string;
  readonly union: string;
  readonly overview: string;
  readonly bulk: { readonly directory: string; readonly manifest: string } | undefined;
  readonly cascade: CascadeOptions;
  readonly classify: ClassifyOptions;
  readonly skipCoTransduction: boolean;
  readonly assumeCoTransduced: boolean;
  readonly coTransducedPatterns: readonly string[];
  readonly allele: string | undefined;
  readonly includeAllFiles: boolean;
  readonly logLevel: PipelineLogLevel;
  readonly concurrency: number;
}

/**
 * Normalize a pattern option into a list of raw patterns
 */
export function toPatternList(patterns: string | readonly string[] | undefined): string[] {
  if (patterns === undefined) return [];
  if (typeof patterns === "string") return parsePatternList(patterns);
  return parsePatternList(patterns.join(","));
}

/**
 * Validate options and fill in defaults
 *
 * @throws {ValidationError} When the options do not match {@link PipelineOptionsSchema}
 */
export function resolvePipelineOptions(options: PipelineOptions = {}): ResolvedPipelineOptions {
  const validation = PipelineOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid pipeline options: ${validation.summary}`);
  }

  const output = options.output ?? DEFAULT_OUTPUT_DIRECTORY;

  return {
    input: options.input ?? DEFAULT_INPUT_DIRECTORY,
    output,
    union: options.union ?? join(output, DEFAULT_UNION_FILE),
    overview: options.overview ?? join(output, DEFAULT_OVERVIEW_FILE),
    bulk:
      options.bulkDir !== undefined && options.bulkManifest !== undefined
        ? { directory: options.bulkDir, manifest: options.bulkManifest }
        : undefined,
    cascade: {
      skipContaminantRemoval: options.skipContaminantRemoval,
      skipFragmentRemoval: options.skipFragmentRemoval,
      skipDuplicateRemoval: options.skipDuplicateRemoval,
      contaminantMarker: options.contaminantMarker,
      fragment: options.fragment,
    },
    classify: { searchProteinAccessions: options.searchProteinAccessions },
    skipCoTransduction: options.skipCoTransduction ?? false,
    assumeCoTransduced: options.assumeCoTransduced ?? false,
    coTransducedPatterns: toPatternList(options.coTransducedPatterns),
    allele: options.allele,
    includeAllFiles: options.includeAllFiles ?? false,
    logLevel: options.logLevel ?? "info",
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
  };
}
