import { describe, expect, test } from "vitest";
import { summarize, toOverviewRow } from "../../src/aggregation/overview";
import { filterPeptides } from "../../src/operations/cascade";
import { classify } from "../../src/operations/cotransduction";
import { compilePattern } from "../../src/operations/core/pattern-compiler";
import { peptide } from "../utils/peptides";

describe("summarize", () => {
  const records = [
    peptide("LVNEVTEFAK", { masterAccessions: ["sp|P02768"] }),
    peptide("SIINFEKL", { masterAccessions: ["tr|VIRUS1"] }),
    peptide("GILGFVFTL", { masterAccessions: ["tr|HOST1"] }),
    peptide("GILGFVFTL", { masterAccessions: ["tr|HOST2"] }),
    peptide("KVFGRCELAAAMKRHGLDNYRGYSL", { masterAccessions: ["tr|HOST3"] }),
  ];

  test("counts removals, co-transduced peptides and lengths", () => {
    const cascade = filterPeptides(records);
    const run = classify(cascade.kept, [compilePattern("tr\\|VIRUS.*")]);

    expect(summarize(run, cascade)).toEqual({
      inputCount: 5,
      contaminantRemoved: 1,
      fragmentRemoved: 0,
      duplicateRemoved: 1,
      remainingCount: 3,
      coTransducedCount: 1,
      coTransducedSequences: ["SIINFEKL"],
      lengthHistogram: { 8: 1, 9: 1, 25: 1 },
    });
  });

  test("skipped stages count zero", () => {
    const cascade = filterPeptides(records, { skipContaminantRemoval: true });
    const summary = summarize(classify(cascade.kept, []), cascade);

    expect(summary.contaminantRemoved).toBe(0);
    expect(summary.remainingCount).toBe(4);
  });

  test("empty input gives a zero summary", () => {
    const cascade = filterPeptides([]);

    expect(summarize([], cascade)).toEqual({
      inputCount: 0,
      contaminantRemoved: 0,
      fragmentRemoved: 0,
      duplicateRemoved: 0,
      remainingCount: 0,
      coTransducedCount: 0,
      coTransducedSequences: [],
      lengthHistogram: {},
    });
  });
});

describe("toOverviewRow", () => {
  test("lays out identity, counts, length columns and match groups", () => {
    const row = toOverviewRow(
      { fileName: "s_1_HLA_A02_HEL_bRP_PeptideGroups.txt", baseName: "s_1_HLA_A02_HEL_bRP", dateCreated: "1" },
      "HLA_A02",
      {
        inputCount: 10,
        contaminantRemoved: 1,
        fragmentRemoved: 2,
        duplicateRemoved: 3,
        remainingCount: 4,
        coTransducedCount: 1,
        coTransducedSequences: ["KVFGRCELA"],
        lengthHistogram: { 6: 1, 9: 2, 16: 1 },
      },
      [{ pattern: "HEL", protein: "HEL", sequences: ["AVFGRCELA", "KVFGRCELA"] }]
    );

    expect([...row.keys()]).toEqual([
      "file_name",
      "date_created",
      "HLA_allele",
      "input_count",
      "sp_count",
      "fragment_count",
      "duplicate_count",
      "total_peptides",
      "co-transduced_count",
      "7mers",
      "8mers",
      "9mers",
      "10mers",
      "11mers",
      "12mers",
      "13mers",
      "14mers",
      "other_mers",
      "co-transduced_protein_0",
      "co-transduced_peptides_0",
    ]);
    expect(row.get("9mers")).toBe(2);
    expect(row.get("other_mers")).toBe(2);
    expect(row.get("co-transduced_peptides_0")).toBe("AVFGRCELA, KVFGRCELA");
  });
});
