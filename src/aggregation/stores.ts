/**
 * Persisted union and overview tables
 *
 * Each store owns one file. Every update is a single read-modify-write
 * holding the store's one-permit semaphore, so concurrent runs sharing a
 * store never lose an update.
 *
 * @module aggregation/stores
 */

import { Effect, Option } from "effect";
import { type PipelineError, toPipelineError } from "../errors";
import { CSVParser, CSVWriter } from "../formats/dsv";
import type { DSVValue } from "../formats/dsv";
import { TableStorage } from "../io/table-storage";
import type { PeptideRecord, UnionTableEntry } from "../types";
import type { OverviewRow } from "./overview";
import { formatUnionTable, mergeUnion, parseUnionTable } from "./union";

function decode<A>(path: string, parse: () => A): Effect.Effect<A, PipelineError> {
  return Effect.try({ try: parse, catch: (error) => toPipelineError(error, path) });
}

export class UnionTableStore {
  private constructor(
    readonly path: string,
    private readonly lock: Effect.Semaphore
  ) {}

  static make(path: string): Effect.Effect<UnionTableStore> {
    return Effect.map(Effect.makeSemaphore(1), (lock) => new UnionTableStore(path, lock));
  }

  /**
   * Current entries; a missing file is an empty union
   */
  load(): Effect.Effect<UnionTableEntry[], PipelineError, TableStorage> {
    const path = this.path;
    return Effect.gen(function* () {
      const storage = yield* TableStorage;
      const text = yield* storage.readText(path);
      if (Option.isNone(text)) {
        return [];
      }
      return yield* decode(path, () => parseUnionTable(text.value, path));
    });
  }

  /**
   * Add one run's peptides to the stored union and rewrite the file
   *
   * Not idempotent: merging the same records twice counts them twice.
   */
  merge(
    records: readonly PeptideRecord[],
    allele: string
  ): Effect.Effect<UnionTableEntry[], PipelineError, TableStorage> {
    const path = this.path;
    const load = this.load();
    return this.lock.withPermits(1)(
      Effect.gen(function* () {
        const storage = yield* TableStorage;
        const existing = yield* load;
        const merged = mergeUnion(existing, records, allele);
        yield* storage.writeText(path, formatUnionTable(merged));
        yield* Effect.logDebug("Union table updated").pipe(
          Effect.annotateLogs({ path, entries: merged.length, added: merged.length - existing.length })
        );
        return merged;
      })
    );
  }
}

/**
 * Ordered union of column names: first-seen order across all rows
 */
export function unionColumns(rows: readonly OverviewRow[], initial: readonly string[] = []): string[] {
  const columns = new Set(initial);
  for (const row of rows) {
    for (const column of row.keys()) {
      columns.add(column);
    }
  }
  return [...columns];
}

export class OverviewTableStore {
  private constructor(
    readonly path: string,
    private readonly lock: Effect.Semaphore
  ) {}

  static make(path: string): Effect.Effect<OverviewTableStore> {
    return Effect.map(Effect.makeSemaphore(1), (lock) => new OverviewTableStore(path, lock));
  }

  /**
   * Stored rows and their column order; a missing file has neither
   */
  load(): Effect.Effect<{ columns: string[]; rows: OverviewRow[] }, PipelineError, TableStorage> {
    const path = this.path;
    return Effect.gen(function* () {
      const storage = yield* TableStorage;
      const text = yield* storage.readText(path);
      if (Option.isNone(text)) {
        return { columns: [], rows: [] };
      }
      const table = yield* decode(path, () =>
        new CSVParser({ raggedRows: "pad" }).parseString(text.value)
      );
      const rows: OverviewRow[] = table.rows.map((row) => new Map<string, DSVValue>(row.values));
      return { columns: [...table.headers], rows };
    });
  }

  /**
   * Append rows after the stored ones and rewrite the file
   */
  append(rows: readonly OverviewRow[]): Effect.Effect<void, PipelineError, TableStorage> {
    const path = this.path;
    const load = this.load();
    return this.lock.withPermits(1)(
      Effect.gen(function* () {
        const storage = yield* TableStorage;
        const existing = yield* load;
        const all = [...existing.rows, ...rows];
        const columns = unionColumns(rows, existing.columns);
        yield* storage.writeText(path, new CSVWriter().formatTable(columns, all));
      })
    );
  }
}
