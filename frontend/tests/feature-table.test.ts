import { describe, test, expect } from "vitest";
import { FeatureTable } from "@/lib/feature-table";
import { SnapshotValidationError } from "@/lib/errors";
import { tableOf, thrown } from "./helpers";

describe("FeatureTable", () => {
  test("zero counts are not stored but read back as 0", () => {
    const table = tableOf([
      ["a", "s1", 0],
      ["a", "s2", 3],
    ]);
    expect(table.featureIds).toEqual(["a"]);
    expect(table.sampleIds).toEqual(["s1", "s2"]);
    expect(table.nonzeroCount).toBe(1);
    expect(table.entries("a").has("s1")).toBe(false);
    expect(table.entries("a")).toEqual(new Map([["s2", 3]]));
    expect(table.toEntries()).toEqual([["a", "s2", 3]]);
  });

  test("features without any nonzero count are still part of the table", () => {
    const table = FeatureTable.fromEntries({ featureIds: ["a", "b"], sampleIds: ["s1"], counts: [["a", "s1", 1]] });
    expect(table.featureCount).toBe(2);
    expect(table.hasFeature("b")).toBe(true);
    expect(table.entries("b").size).toBe(0);
  });

  test("every problem is reported in one error", () => {
    const err = thrown(() =>
      FeatureTable.fromEntries({
        featureIds: ["a", "a"],
        sampleIds: ["s1"],
        counts: [
          ["b", "s1", 1],
          ["a", "s2", 1],
          ["a", "s1", -1],
          ["a", "s1", 2],
          ["a", "s1", 3],
        ],
      }),
    );
    expect(err).toBeInstanceOf(SnapshotValidationError);
    expect(err).toMatchObject({
      problems: [
        'duplicate feature id "a"',
        'count for unknown feature "b"',
        'count for unknown sample "s2"',
        'invalid count -1 for ("a", "s1")',
        'repeated count for ("a", "s1")',
      ],
    });
  });

  test("an empty table is rejected", () => {
    expect(thrown(() => FeatureTable.fromEntries({ featureIds: [], sampleIds: [], counts: [] }))).toHaveProperty(
      "message",
      "Invalid dataset snapshot (2 problems): table has no features; table has no samples",
    );
  });

  test("non-finite counts are invalid", () => {
    expect(thrown(() => tableOf([["a", "s1", Number.NaN]]))).toHaveProperty(
      "message",
      'Invalid dataset snapshot: invalid count NaN for ("a", "s1")',
    );
  });
});
