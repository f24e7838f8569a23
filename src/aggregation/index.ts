export { summarize, toOverviewRow, REPORTED_LENGTHS } from "./overview";
export type { OverviewRow } from "./overview";
export {
  formatUnionTable,
  mergeUnion,
  parseUnionTable,
  unionKey,
  UNION_COLUMNS,
} from "./union";
export { OverviewTableStore, UnionTableStore, unionColumns } from "./stores";
