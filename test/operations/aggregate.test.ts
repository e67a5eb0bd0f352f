import { describe, expect, test } from "vitest";
import { MergeInvariantError } from "../../src/errors.js";
import {
  aggregateVariant,
  computeFrequency,
  formatFrequency,
  toOutputFields,
  wingBlock,
} from "../../src/operations/aggregate.js";
import { studyTable, variant } from "../utils/lof-fixtures.js";

describe("aggregateVariant", () => {
  const shared = variant("rs1");

  test("sums carriers and samples across studies in intersection mode", () => {
    const study1 = studyTable("s1.tsv", ["A1", "A2", "A3"], [[shared, [0, 1, 2]]]);
    const study2 = studyTable("s2.tsv", ["B1", "B2"], [[shared, [1, 0]]]);

    const aggregated = aggregateVariant(shared, [study1, study2], "intersection", "0");

    expect(aggregated).toEqual({
      key: shared,
      totalSamples: 5,
      heterozygousLofCount: 2,
      homozygousLofCount: 1,
      genotypeBlocks: ["0\t1\t2", "1\t0"],
    });
    expect(toOutputFields(aggregated).join("\t")).toBe(
      "rs1\tA\tstop_gained\tENSG_GENE1\tGENE1\t0.4\t0.2\t2\t1\t0\t1\t2\t1\t0"
    );
  });

  test("pads an absent study with wing values in union mode", () => {
    const study1 = studyTable("s1.tsv", ["A1", "A2"], [[shared, [1, 1]]]);
    const study2 = studyTable("s2.tsv", ["B1", "B2", "B3", "B4"], [[variant("rs9"), [0, 0, 0, 0]]]);

    const aggregated = aggregateVariant(shared, [study1, study2], "union", "0");

    expect(aggregated.genotypeBlocks).toEqual(["1\t1", "0\t0\t0\t0"]);
    expect(aggregated.totalSamples).toBe(6);
    expect(aggregated.heterozygousLofCount).toBe(2);
    expect(aggregated.homozygousLofCount).toBe(0);
  });

  test("uses the configured wing value", () => {
    const study1 = studyTable("s1.tsv", ["A1"], [[variant("rs9"), [2]]]);
    const study2 = studyTable("s2.tsv", ["B1"], [[shared, [2]]]);

    const aggregated = aggregateVariant(shared, [study1, study2], "union", "NA");

    expect(aggregated.genotypeBlocks).toEqual(["NA", "2"]);
    expect(toOutputFields(aggregated).slice(5)).toEqual(["0", "0.5", "0", "1", "NA", "2"]);
  });

  test("rejects a missing study in intersection mode", () => {
    const study1 = studyTable("s1.tsv", ["A1"], [[shared, [1]]]);
    const study2 = studyTable("s2.tsv", ["B1"], []);

    expect(() => aggregateVariant(shared, [study1, study2], "intersection", "0")).toThrow(
      MergeInvariantError
    );
  });

  test("doubles counts when a study is merged with itself", () => {
    const study = studyTable("s1.tsv", ["A1", "A2", "A3", "A4"], [[shared, [1, 2, 2, 0]]]);

    const aggregated = aggregateVariant(shared, [study, study], "intersection", "0");

    expect(aggregated.heterozygousLofCount).toBe(2);
    expect(aggregated.homozygousLofCount).toBe(4);
    expect(aggregated.totalSamples).toBe(8);
  });
});

describe("wingBlock", () => {
  test("repeats the wing value once per sample", () => {
    expect(wingBlock("0", 4)).toBe("0\t0\t0\t0");
    expect(wingBlock("NA", 1)).toBe("NA");
    expect(wingBlock("0", 0)).toBe("");
  });
});

describe("computeFrequency", () => {
  test("returns NA when there are no samples", () => {
    expect(computeFrequency(0, 0)).toBe("NA");
    expect(computeFrequency(3, 0)).toBe("NA");
  });

  test("returns integer zero when there are no carriers", () => {
    expect(computeFrequency(0, 5)).toBe(0);
    expect(formatFrequency(computeFrequency(0, 5))).toBe("0");
  });

  test("divides carriers by samples", () => {
    expect(computeFrequency(2, 5)).toBe(0.4);
    expect(computeFrequency(5, 5)).toBe(1);
  });
});

describe("formatFrequency", () => {
  test("keeps at most fifteen significant digits", () => {
    expect(formatFrequency(1 / 3)).toBe("0.333333333333333");
    expect(formatFrequency(2 / 3)).toBe("0.666666666666667");
  });

  test("prints short quotients without padding", () => {
    expect(formatFrequency(0.4)).toBe("0.4");
    expect(formatFrequency(0.125)).toBe("0.125");
    expect(formatFrequency(1)).toBe("1");
  });

  test("switches to a two-digit exponent below 1e-4", () => {
    expect(formatFrequency(computeFrequency(1, 20000))).toBe("5e-05");
    expect(formatFrequency(computeFrequency(3, 1e7))).toBe("3e-07");
    expect(formatFrequency(1 / 30000)).toBe("3.33333333333333e-05");
    expect(formatFrequency(1e-4)).toBe("0.0001");
  });

  test("passes NA through", () => {
    expect(formatFrequency("NA")).toBe("NA");
  });
});
