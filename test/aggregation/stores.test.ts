/**
 * Tests for the union and overview stores against in-memory storage
 */

import { Effect, Layer } from "effect";
import { describe, expect, test } from "vitest";
import { OverviewTableStore, UnionTableStore } from "../../src/aggregation/stores";
import { SchemaMismatchError } from "../../src/errors";
import { createMemoryStorage, TableStorage } from "../../src/io/table-storage";
import { peptide } from "../utils/peptides";

function run<A, E>(program: Effect.Effect<A, E, TableStorage>, files: Map<string, string>): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(TableStorage.memory(files))));
}

/**
 * Memory storage whose reads yield to other fibers before returning, so
 * unguarded read-modify-write cycles interleave
 */
function yieldingStorage(files: Map<string, string>): Layer.Layer<TableStorage> {
  const storage = createMemoryStorage(files);
  return Layer.succeed(TableStorage, {
    ...storage,
    readText: (path) => storage.readText(path).pipe(Effect.tap(() => Effect.yieldNow())),
  });
}

describe("UnionTableStore", () => {
  test("creates the file on first merge and adds to it afterwards", async () => {
    const files = new Map<string, string>();
    const first = peptide("SIINFEKL");
    const records = [first, peptide("GILGFVFTL")];

    await run(
      Effect.gen(function* () {
        const store = yield* UnionTableStore.make("out/union_table.csv");
        yield* store.merge(records, "HLA_A02");
        yield* store.merge([first], "HLA_A02");
      }),
      files
    );

    expect(files.get("out/union_table.csv")).toBe(
      "Allele,Sequence,Length,Master Protein Accessions,Master Protein Descriptions,Count\n" +
        "HLA_A02,SIINFEKL,8,,,2\n" +
        "HLA_A02,GILGFVFTL,9,,,1\n"
    );
  });

  test("concurrent merges are serialized", async () => {
    const files = new Map<string, string>();

    const entries = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* UnionTableStore.make("union.csv");
        yield* Effect.all(
          Array.from({ length: 10 }, () => store.merge([peptide("SIINFEKL")], "HLA_A02")),
          { concurrency: "unbounded" }
        );
        return yield* store.load();
      }).pipe(Effect.provide(yieldingStorage(files)))
    );

    expect(entries.map((entry) => entry.count)).toEqual([10]);
  });

  test("fails with SchemaMismatchError on a foreign table", async () => {
    const files = new Map([["union.csv", "Peptide,Count\nSIINFEKL,1\n"]]);

    const error = await run(
      Effect.gen(function* () {
        const store = yield* UnionTableStore.make("union.csv");
        return yield* Effect.flip(store.merge([peptide("SIINFEKL")], "HLA_A02"));
      }),
      files
    );

    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(files.get("union.csv")).toBe("Peptide,Count\nSIINFEKL,1\n");
  });
});

describe("OverviewTableStore", () => {
  test("concurrent appends are serialized", async () => {
    const files = new Map<string, string>();

    await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* OverviewTableStore.make("final_table.csv");
        yield* Effect.all(
          Array.from({ length: 5 }, (_, index) =>
            store.append([new Map([["file_name", `run${index}.txt`]])])
          ),
          { concurrency: "unbounded" }
        );
      }).pipe(Effect.provide(yieldingStorage(files)))
    );

    const [header, ...rows] = files.get("final_table.csv")?.trimEnd().split("\n") ?? [];
    expect(header).toBe("file_name");
    expect(rows.sort()).toEqual(["run0.txt", "run1.txt", "run2.txt", "run3.txt", "run4.txt"]);
  });

  test("appends rows and widens the columns", async () => {
    const files = new Map([["final_table.csv", "file_name,input_count\na.txt,3\n"]]);

    await run(
      Effect.gen(function* () {
        const store = yield* OverviewTableStore.make("final_table.csv");
        yield* store.append([
          new Map<string, string | number>([
            ["file_name", "b.txt"],
            ["input_count", 5],
            ["co-transduced_protein_0", "HEL"],
          ]),
        ]);
      }),
      files
    );

    expect(files.get("final_table.csv")).toBe(
      "file_name,input_count,co-transduced_protein_0\na.txt,3,\nb.txt,5,HEL\n"
    );
  });
});
