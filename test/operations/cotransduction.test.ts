/**
 * Tests for co-transduction classification and match groups
 */

import { describe, expect, test } from "vitest";
import { compilePattern } from "../../src/operations/core/pattern-compiler";
import {
  classify,
  collectMatchGroups,
  inferCoTransducedPattern,
} from "../../src/operations/cotransduction";
import { peptide } from "../utils/peptides";

const hel = peptide("KVFGRCELA", {
  masterAccessions: ["tr|P00698"],
  masterDescriptions: ["Lysozyme C OS=Gallus gallus", "HEL"],
});
const gfp = peptide("SKGEELFTG", {
  masterAccessions: ["tr|P42212"],
  masterDescriptions: ["Green fluorescent protein"],
});
const host = peptide("GILGFVFTL", {
  masterAccessions: ["tr|Q00001"],
  masterDescriptions: ["Host protein"],
  proteinAccessions: ["tr|Q00001", "GFP-like"],
});

describe("classify", () => {
  test("marks records matching any pattern against any single value", () => {
    const patterns = [compilePattern("HEL"), compilePattern("Green.*")];

    const result = classify([hel, gfp, host], patterns);

    expect(result.map((record) => record.coTransduced)).toEqual([true, true, false]);
    expect(result.map((record) => record.matchedPattern)).toEqual(["HEL", "Green.*", undefined]);
  });

  test("reports the first matching pattern in supplied order", () => {
    const result = classify([hel], [compilePattern(".*"), compilePattern("HEL")]);

    expect(result[0]?.matchedPattern).toBe(".*");
  });

  test("with no patterns nothing is co-transduced", () => {
    const result = classify([hel, gfp], []);

    expect(result.every((record) => !record.coTransduced)).toBe(true);
    expect(result).toHaveLength(2);
  });

  test("protein accessions are searched only when enabled", () => {
    const patterns = [compilePattern("GFP-like")];

    expect(classify([host], patterns)[0]?.coTransduced).toBe(false);
    expect(classify([host], patterns, { searchProteinAccessions: true })[0]?.coTransduced).toBe(true);
  });

  test("keeps the record's own fields", () => {
    const [result] = classify([gfp], [compilePattern("tr\\|P42212")]);

    expect(result?.sequence).toBe("SKGEELFTG");
    expect(result?.extraColumns).toBe(gfp.extraColumns);
    expect(result?.coTransduced).toBe(true);
  });
});

describe("collectMatchGroups", () => {
  test("groups distinct sorted sequences per matching value", () => {
    const second = peptide("AVFGRCELA", { masterDescriptions: ["HEL"] });
    const patterns = [compilePattern("HEL"), compilePattern(".*fluorescent.*")];

    const groups = collectMatchGroups([hel, second, gfp], patterns);

    expect(groups).toEqual([
      { pattern: "HEL", protein: "HEL", sequences: ["AVFGRCELA", "KVFGRCELA"] },
      { pattern: ".*fluorescent.*", protein: "Green fluorescent protein", sequences: ["SKGEELFTG"] },
    ]);
  });
});

describe("inferCoTransducedPattern", () => {
  test("builds a literal pattern from the file name", () => {
    const pattern = inferCoTransducedPattern("test1_000000_HLA_A010101_HEL_bRP_PeptideGroups.txt");

    expect(pattern?.rawExpression).toBe("HEL");
    expect(pattern?.source).toBe("inferred");
  });

  test("returns undefined for names without a co-transduced span", () => {
    expect(inferCoTransducedPattern("run_PeptideGroups.txt")).toBeUndefined();
  });

  test("returns undefined for a blank span", () => {
    expect(inferCoTransducedPattern("s_1_HLA_A02__bRP_PeptideGroups.txt")).toBeUndefined();
  });
});
