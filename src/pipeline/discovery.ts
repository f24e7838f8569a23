/**
 * Input file discovery
 */

import { Effect } from "effect";
import type { FileError } from "../errors";
import { TableStorage } from "../io/table-storage";

/**
 * Directories the pipeline writes into; skipped when the input and output
 * directories overlap
 */
export const OUTPUT_DIRECTORIES: ReadonlySet<string> = new Set([
  "sp_peptides",
  "spRM_peptides",
  "frag_peptides",
  "fragRM_peptides",
  "fragRM_spRM_peptides",
  "dup_peptides",
  "dupRM_peptides",
  "dupRM_spRM_peptides",
  "dupRM_fragRM_peptides",
  "dupRM_fragRM_spRM_peptides",
  "final_peptides",
  "final_peptides_8-14",
  "image_output",
  "logo_results",
]);

const PEPTIDE_GROUPS_FILE = "PeptideGroups.txt";

export interface DiscoveryOptions {
  /** Accept every file, not only `*PeptideGroups.txt` */
  readonly includeAllFiles?: boolean;
}

/**
 * Files under `root`, depth first in name order
 *
 * Hidden entries and output directories are skipped.
 */
export const discoverPeptideFiles = (
  root: string,
  options: DiscoveryOptions = {}
): Effect.Effect<string[], FileError, TableStorage> =>
  Effect.gen(function* () {
    const storage = yield* TableStorage;
    const files: string[] = [];

    const visit = (directory: string): Effect.Effect<void, FileError> =>
      Effect.gen(function* () {
        for (const entry of yield* storage.listDirectory(directory)) {
          if (entry.name.startsWith(".")) {
            yield* Effect.logDebug(`Ignored hidden entry ${entry.path}`);
          } else if (entry.isDirectory) {
            if (OUTPUT_DIRECTORIES.has(entry.name)) {
              yield* Effect.logDebug(`Ignored output directory ${entry.path}`);
            } else {
              yield* visit(entry.path);
            }
          } else if (options.includeAllFiles === true || entry.name.endsWith(PEPTIDE_GROUPS_FILE)) {
            files.push(entry.path);
          } else {
            yield* Effect.logDebug(`Ignored file ${entry.path}`);
          }
        }
      });

    yield* visit(root);
    return files;
  });
