/**
 * Tests for the cascading filter
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { filterPeptides, stageTableNames } from "../../src/operations/cascade";
import type { PeptideRecord } from "../../src/types";
import { peptide } from "../utils/peptides";

const contaminant = peptide("LVNEVTEFAK", { masterAccessions: ["sp|P02768|ALBU_HUMAN"] });
const parent = peptide("AAGSLSRELK", { masterAccessions: ["tr|P1"] });
const fragment = peptide("GSLSREL", { masterAccessions: ["tr|P1"] });
const unique = peptide("GILGFVFTL", { masterAccessions: ["tr|P2"] });
const duplicate = peptide("GILGFVFTL", { masterAccessions: ["tr|P3"] });

const records = [contaminant, parent, fragment, unique, duplicate];

describe("filterPeptides", () => {
  test("runs contaminant, fragment and duplicate removal in order", () => {
    const result = filterPeptides(records);

    expect(result.stages.map((stage) => stage.stage)).toEqual(["contaminant", "fragment", "duplicate"]);
    expect(result.stage("contaminant").removed).toEqual([contaminant]);
    expect(result.stage("fragment").removed).toEqual([fragment]);
    expect(result.stage("duplicate").removed).toEqual([duplicate]);
    expect(result.kept).toEqual([parent, unique]);
  });

  test("each stage partitions its input, which is the previous stage's kept set", () => {
    const result = filterPeptides(records);

    let input: readonly PeptideRecord[] = records;
    for (const stage of result.stages) {
      expect(stage.input).toEqual(input);
      expect(stage.kept.every((record) => stage.input.includes(record))).toBe(true);
      expect(stage.kept.some((record) => stage.removed.includes(record))).toBe(false);
      expect(stage.kept.length + stage.removed.length).toBe(stage.input.length);
      input = stage.kept;
    }
    expect(result.kept).toEqual(input);
  });

  test("names audit tables cumulatively", () => {
    const result = filterPeptides(records);

    expect(result.stages.map((stage) => [stage.removedTable, stage.keptTable])).toEqual([
      ["sp_peptides", "spRM_peptides"],
      ["frag_peptides", "fragRM_spRM_peptides"],
      ["dup_peptides", "dupRM_fragRM_spRM_peptides"],
    ]);
  });

  test("skipped stages are left out and pass records through", () => {
    const result = filterPeptides(records, { skipContaminantRemoval: true });

    expect(result.stages.map((stage) => stage.keptTable)).toEqual([
      "fragRM_peptides",
      "dupRM_fragRM_peptides",
    ]);
    const skipped = result.stage("contaminant");
    expect(skipped.enabled).toBe(false);
    expect(skipped.removed).toEqual([]);
    expect(skipped.kept).toEqual(records);
    expect(result.kept).toContain(contaminant);
  });

  test("a skipped middle stage passes through the previous kept set", () => {
    const result = filterPeptides(records, { skipFragmentRemoval: true });

    expect(result.stage("fragment").input).toEqual(result.stage("contaminant").kept);
    expect(result.stage("duplicate").keptTable).toBe("dupRM_spRM_peptides");
    expect(result.kept).toEqual([parent, fragment, unique]);
  });

  test("with every stage skipped the input is kept", () => {
    const result = filterPeptides(records, {
      skipContaminantRemoval: true,
      skipFragmentRemoval: true,
      skipDuplicateRemoval: true,
    });

    expect(result.stages).toEqual([]);
    expect(result.kept).toEqual(records);
  });

  test("empty input gives empty stages", () => {
    const result = filterPeptides([]);

    expect(result.stages.every((stage) => stage.kept.length === 0 && stage.removed.length === 0)).toBe(
      true
    );
    expect(result.kept).toEqual([]);
  });

  test("rejects invalid options", () => {
    expect(() => filterPeptides(records, { contaminantMarker: "" })).toThrow(ValidationError);
  });

  test("stageTableNames", () => {
    expect(stageTableNames("duplicate", [])).toEqual({
      removedTable: "dup_peptides",
      keptTable: "dupRM_peptides",
    });
  });
});
