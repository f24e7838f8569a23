import { describe, expect, test } from "vitest";
import { ExactDeduplicator } from "../../../src/operations/core/sequence-deduplicator";
import { peptide } from "../../utils/peptides";

describe("ExactDeduplicator", () => {
  test("flags repeats regardless of case", () => {
    const dedup = new ExactDeduplicator();
    const flags = [peptide("SIINFEKL"), peptide("siinfekl"), peptide("GILGFVFTL")].map((record) =>
      dedup.isDuplicate(record)
    );

    expect(flags).toEqual([false, true, false]);
  });

  test("separate instances keep separate state", () => {
    const first = new ExactDeduplicator();
    first.isDuplicate(peptide("SIINFEKL"));

    expect(new ExactDeduplicator().isDuplicate(peptide("SIINFEKL"))).toBe(false);
  });
});
