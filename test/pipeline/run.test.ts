/**
 * End-to-end tests for single mode against in-memory storage
 */

import { Effect, Logger, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import { OverviewTableStore, UnionTableStore } from "../../src/aggregation/stores";
import { PeptideFileError } from "../../src/errors";
import { TableStorage } from "../../src/io/table-storage";
import { runPipeline } from "../../src/pipeline";
import { type PipelineOptions, resolvePipelineOptions } from "../../src/pipeline/options";
import { type RunOverrides, runPeptideFile, tablePath } from "../../src/pipeline/run";
import { FIVE_PEPTIDE_RUN, peptideGroupsText } from "../utils/peptides";

const RUN_FILE = "in/s_1_HLA_A02_HEL_bRP_PeptideGroups.txt";
const BASE = "s_1_HLA_A02_HEL_bRP";

const SOURCE_HEADER =
  "Sequence,Master Protein Accessions,Master Protein Descriptions,Protein Accessions,RT [min]";

describe("runPipeline", () => {
  test("cleans, classifies and aggregates a run", async () => {
    const files = new Map([[RUN_FILE, FIVE_PEPTIDE_RUN]]);

    const result = await runPipeline(
      { input: "in", output: "out", coTransducedPatterns: ".*VIRUS.*", logLevel: "none" },
      TableStorage.memory(files)
    );

    expect(result.skipped).toEqual([]);
    expect(result.runs).toHaveLength(1);
    const run = result.runs[0];
    expect(run?.summary).toMatchObject({
      inputCount: 5,
      contaminantRemoved: 1,
      fragmentRemoved: 1,
      duplicateRemoved: 1,
      remainingCount: 2,
      coTransducedCount: 1,
      coTransducedSequences: ["AAGSLSRELK"],
    });
    expect(run?.allele).toBe("HLA_A02");

    const finalRows =
      "AAGSLSRELK,tr|V00001,VIRUS capsid protein,tr|V00001,20.0,true,.*VIRUS.*\n" +
      "GILGFVFTL,tr|H00001,Host protein,tr|H00001,30.0,false,\n";
    expect(files.get(tablePath("out", BASE, "final_peptides"))).toBe(
      `${SOURCE_HEADER},Co-transduced,Matched Pattern\n${finalRows}`
    );
    expect(files.get(tablePath("out", BASE, "final_peptides_8-14"))).toBe(
      `${SOURCE_HEADER},Co-transduced,Matched Pattern\n${finalRows}`
    );

    expect(files.get(union("out"))).toBe(
      "Allele,Sequence,Length,Master Protein Accessions,Master Protein Descriptions,Count\n" +
        "HLA_A02,AAGSLSRELK,10,tr|V00001,VIRUS capsid protein,1\n" +
        "HLA_A02,GILGFVFTL,9,tr|H00001,Host protein,1\n"
    );
    expect(files.get("out/final_table.csv")).toBe(
      "file_name,date_created,HLA_allele,input_count,sp_count,fragment_count,duplicate_count," +
        "total_peptides,co-transduced_count,7mers,8mers,9mers,10mers,11mers,12mers,13mers,14mers," +
        "other_mers,co-transduced_protein_0,co-transduced_peptides_0\n" +
        "s_1_HLA_A02_HEL_bRP_PeptideGroups.txt,1,HLA_A02,5,1,1,1,2,1,0,0,1,1,0,0,0,0,0," +
        "VIRUS capsid protein,AAGSLSRELK\n"
    );
  });

  test("writes every audit table", async () => {
    const files = new Map([[RUN_FILE, FIVE_PEPTIDE_RUN]]);

    await runPipeline({ input: "in", output: "out", logLevel: "none" }, TableStorage.memory(files));

    expect(files.get(tablePath("out", BASE, "sp_peptides"))).toBe(
      `${SOURCE_HEADER}\nLVNEVTEFAK,sp|P02768|ALBU_HUMAN,Serum albumin,sp|P02768,10.1\n`
    );
    expect(files.get(tablePath("out", BASE, "frag_peptides"))).toBe(
      `${SOURCE_HEADER}\nGSLSREL,tr|V00001,VIRUS capsid protein,tr|V00001,20.3\n`
    );
    expect(files.get(tablePath("out", BASE, "dup_peptides"))).toBe(
      `${SOURCE_HEADER}\nGILGFVFTL,tr|H00002,Host protein 2,tr|H00002,30.1\n`
    );
    for (const table of ["spRM_peptides", "fragRM_spRM_peptides", "dupRM_fragRM_spRM_peptides"]) {
      expect(files.has(tablePath("out", BASE, table))).toBe(true);
    }
  });

  test("running twice adds to the union and the overview", async () => {
    const files = new Map([[RUN_FILE, FIVE_PEPTIDE_RUN]]);
    const options = { input: "in", output: "out", logLevel: "none" } as const;

    await runPipeline(options, TableStorage.memory(files));
    await runPipeline(options, TableStorage.memory(files));

    expect(files.get(union("out"))).toBe(
      "Allele,Sequence,Length,Master Protein Accessions,Master Protein Descriptions,Count\n" +
        "HLA_A02,AAGSLSRELK,10,tr|V00001,VIRUS capsid protein,2\n" +
        "HLA_A02,GILGFVFTL,9,tr|H00001,Host protein,2\n"
    );
    expect(files.get("out/final_table.csv")?.trimEnd().split("\n")).toHaveLength(3);
  });

  test("skips files that are not peptide tables", async () => {
    const files = new Map([
      ["in/bad_PeptideGroups.txt", "Peptide\nSIINFEKL\n"],
      [RUN_FILE, FIVE_PEPTIDE_RUN],
    ]);

    const result = await runPipeline({ input: "in", output: "out", logLevel: "none" }, TableStorage.memory(files));

    expect(result.runs.map((run) => run.info.fileName)).toEqual(["s_1_HLA_A02_HEL_bRP_PeptideGroups.txt"]);
    expect(result.skipped.map((skipped) => skipped.path)).toEqual(["in/bad_PeptideGroups.txt"]);
    expect(result.skipped[0]?.error).toBeInstanceOf(PeptideFileError);
  });

  test("a blank co-transduced span in the file name infers no pattern", async () => {
    const files = new Map([["in/s_1_HLA_A02__bRP_PeptideGroups.txt", FIVE_PEPTIDE_RUN]]);

    const result = await runPipeline(
      { input: "in", output: "out", assumeCoTransduced: true, logLevel: "none" },
      TableStorage.memory(files)
    );

    expect(result.skipped).toEqual([]);
    expect(result.runs.map((run) => run.patterns)).toEqual([[]]);
    expect(result.runs[0]?.summary.coTransducedCount).toBe(0);
  });

  test("rejects with the original error when the input directory is missing", async () => {
    await expect(
      runPipeline({ input: "missing", output: "out", logLevel: "none" }, TableStorage.memory(new Map()))
    ).rejects.toMatchObject({ name: "FileError", operation: "list" });
  });
});

describe("runPeptideFile", () => {
  const runOne = (
    path: string,
    text: string,
    options: PipelineOptions,
    overrides: RunOverrides = {}
  ) => {
    const files = new Map([[path, text]]);
    const program = Effect.gen(function* () {
      const target = {
        output: "out",
        union: yield* UnionTableStore.make("out/union.csv"),
        overview: yield* OverviewTableStore.make("out/overview.csv"),
      };
      return yield* runPeptideFile(path, resolvePipelineOptions(options), target, overrides);
    });
    return Effect.runPromise(
      program.pipe(Logger.withMinimumLogLevel(LogLevel.None), Effect.provide(TableStorage.memory(files)))
    );
  };

  const helRun = peptideGroupsText(
    ["Sequence", "Master Protein Accessions", "Master Protein Descriptions"],
    [
      ["KVFGRCELA", "tr|P00698", "HEL"],
      ["SIINFEKL", "tr|P01012", "Ovalbumin"],
    ]
  );

  test("infers a literal pattern from the file name", async () => {
    const result = await runOne(RUN_FILE, helRun, { assumeCoTransduced: true });

    expect(result.patterns.map((pattern) => [pattern.rawExpression, pattern.source])).toEqual([
      ["HEL", "inferred"],
    ]);
    expect(result.classified.map((record) => record.coTransduced)).toEqual([true, false]);
  });

  test("places the inferred pattern before explicit ones", async () => {
    const result = await runOne(RUN_FILE, helRun, {
      assumeCoTransduced: true,
      coTransducedPatterns: "Oval.*",
    });

    expect(result.patterns.map((pattern) => pattern.rawExpression)).toEqual(["HEL", "Oval.*"]);
    expect(result.summary.coTransducedCount).toBe(2);
  });

  test("skipCoTransduction classifies nothing", async () => {
    const result = await runOne(RUN_FILE, helRun, {
      assumeCoTransduced: true,
      skipCoTransduction: true,
    });

    expect(result.patterns).toEqual([]);
    expect(result.summary.coTransducedCount).toBe(0);
  });

  test("invalid patterns are dropped and the rest still apply", async () => {
    const result = await runOne(RUN_FILE, helRun, { coTransducedPatterns: "[, HEL" });

    expect(result.patterns.map((pattern) => pattern.rawExpression)).toEqual(["HEL"]);
    expect(result.summary.coTransducedCount).toBe(1);
  });

  test("manifest patterns and allele override the configured ones", async () => {
    const result = await runOne(
      "in/run_PeptideGroups.txt",
      helRun,
      { coTransducedPatterns: "HEL" },
      { coTransducedPatterns: ["Ovalbumin"], allele: "HLA_B07" }
    );

    expect(result.allele).toBe("HLA_B07");
    expect(result.classified.map((record) => record.matchedPattern)).toEqual([undefined, "Ovalbumin"]);
  });

  test("falls back to an unknown allele", async () => {
    const result = await runOne("in/run_PeptideGroups.txt", helRun, {});

    expect(result.allele).toBe("unknown");
  });
});

function union(output: string): string {
  return `${output}/union_table.csv`;
}
