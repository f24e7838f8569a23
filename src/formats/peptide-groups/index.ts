/**
 * @module formats/peptide-groups
 * @description ProteomeDiscoverer PeptideGroups tables
 */

export { COLUMNS, CO_TRANSDUCED_TERMINATOR, PEPTIDE_GROUPS_SUFFIX } from "./constants";
export { getBaseName, inferAllele, inferCoTransduced, parseRunFileName } from "./filename";
export {
  cleanAnnotatedSequence,
  PeptideGroupsParser,
  type PeptideTable,
  splitMultiValue,
} from "./parser";
export { type DerivedColumn, formatPeptideTable } from "./writer";
