/**
 * Run metadata encoded in PeptideGroups file names
 *
 * Files follow `<sample>_<date>_HLA_<allele>_<co-transduced…>_bRP_PeptideGroups.txt`,
 * e.g. `test1_000000_HLA_A010101_HEL_bRP_PeptideGroups.txt`. Some runs write
 * the allele as one token (`sample_2024_HLAB7_peptideX_bRP_…`).
 */

import type { RunFileInfo } from "../../types";
import { CO_TRANSDUCED_TERMINATOR, PEPTIDE_GROUPS_SUFFIX } from "./constants";

/** Fewer tokens than this cannot carry a co-transduced span */
const MIN_TOKENS_FOR_INFERENCE = 5;

/**
 * Strip directories and the `_PeptideGroups.txt` / `.txt` suffix
 */
export function getBaseName(fileName: string): string {
  const name = fileName.split(/[\\/]/).pop() ?? fileName;
  if (name.endsWith(PEPTIDE_GROUPS_SUFFIX)) {
    return name.slice(0, -PEPTIDE_GROUPS_SUFFIX.length);
  }
  if (name.endsWith(".txt")) {
    return name.slice(0, -".txt".length);
  }
  return name;
}

/**
 * Index of the first token after the allele designation
 *
 * The allele starts at the third token: `HLA` followed by the allele proper
 * takes two tokens, anything else (`HLAB7`) takes one.
 */
function afterAlleleIndex(tokens: readonly string[]): number {
  return tokens[2] === "HLA" ? 4 : 3;
}

/**
 * Allele designation, e.g. `HLA_A010101` or `HLAB7`
 */
export function inferAllele(fileName: string): string | undefined {
  const tokens = getBaseName(fileName).split("_");
  const first = tokens[2];
  if (first === "HLA") {
    const second = tokens[3];
    return second !== undefined && second !== "" ? `HLA_${second}` : undefined;
  }
  return first !== undefined && first.toUpperCase().startsWith("HLA") ? first : undefined;
}

/**
 * Literal co-transduced protein text from a run file name
 *
 * The span runs from the token after the allele to the token before `bRP`,
 * re-joined with underscores.
 *
 * @returns undefined when the name has fewer than five tokens, no `bRP`
 * token, or only blank tokens between the allele and `bRP`
 */
export function inferCoTransduced(fileName: string): string | undefined {
  const tokens = getBaseName(fileName).split("_");
  if (tokens.length < MIN_TOKENS_FOR_INFERENCE) {
    return undefined;
  }

  const start = afterAlleleIndex(tokens);
  const end = tokens.indexOf(CO_TRANSDUCED_TERMINATOR, start);
  if (end <= start) {
    return undefined;
  }

  const span = tokens.slice(start, end);
  return span.every((token) => token.trim() === "") ? undefined : span.join("_");
}

/**
 * Everything the pipeline derives from a run's file name
 */
export function parseRunFileName(fileName: string): RunFileInfo {
  const name = fileName.split(/[\\/]/).pop() ?? fileName;
  const baseName = getBaseName(name);
  const dateToken = baseName.split("_")[1];

  return {
    fileName: name,
    baseName,
    dateCreated: dateToken !== undefined && dateToken !== "" ? dateToken : undefined,
    allele: inferAllele(name),
    coTransduced: inferCoTransduced(name),
  };
}
