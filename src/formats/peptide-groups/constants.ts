/**
 * Column names and file name conventions of ProteomeDiscoverer
 * PeptideGroups exports
 */

export const COLUMNS = {
  sequence: "Sequence",
  annotatedSequence: "Annotated Sequence",
  masterAccessions: "Master Protein Accessions",
  masterDescriptions: "Master Protein Descriptions",
  proteinAccessions: "Protein Accessions",
  length: "length",
} as const;

/** Retention time columns are named "RT [min]", "RT in min", … */
export const RETENTION_TIME_PREFIX = "RT";

/** Separator inside multi-valued accession/description cells */
export const MULTI_VALUE_SEPARATOR = ";";

export const PEPTIDE_GROUPS_SUFFIX = "_PeptideGroups.txt";

/** Token that closes the co-transduced span of a run file name */
export const CO_TRANSDUCED_TERMINATOR = "bRP";
