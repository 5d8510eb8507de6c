import { describe, expect, test } from "vitest";
import { isDomainError } from "./errors";
import { dayCount, rowCount, toInflammationTable } from "./table";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("table shape", () => {
  test("counts rows and days", () => {
    const table = [
      [0, 1, 2],
      [3, 4, 5],
    ];
    expect(rowCount(table)).toBe(2);
    expect(dayCount(table)).toBe(3);
  });

  test("empty table has no days", () => {
    expect(rowCount([])).toBe(0);
    expect(dayCount([])).toBe(0);
  });

  test("ragged rows are reported", () => {
    const err = thrownBy(() => dayCount([[1, 2], [3, 4], [5]]));
    expect(isDomainError(err, "RaggedTable")).toBe(true);
    expect(err).toHaveProperty("message", "Row 2 has 1 days, expected 2");
  });
});

describe("toInflammationTable", () => {
  test("accepts a rectangular numeric array", () => {
    const parsed: unknown = JSON.parse("[[0, 1.5], [2, 3]]");
    expect(toInflammationTable(parsed)).toEqual([
      [0, 1.5],
      [2, 3],
    ]);
  });

  test("passes NaN through", () => {
    expect(toInflammationTable([[Number.NaN, 1]])).toEqual([[Number.NaN, 1]]);
  });

  test("rejects a non-array value", () => {
    const err = thrownBy(() => toInflammationTable({ rows: [] }));
    expect(isDomainError(err, "MalformedTable")).toBe(true);
  });

  test("rejects a row that is not an array", () => {
    const err = thrownBy(() => toInflammationTable([[1], 2]));
    expect(isDomainError(err, "MalformedTable")).toBe(true);
    expect(err).toHaveProperty("message", "Row 1 is not an array");
  });

  test("rejects numeric strings instead of coercing them", () => {
    const err = thrownBy(() => toInflammationTable([[1, "2"]]));
    expect(isDomainError(err, "MalformedTable")).toBe(true);
    expect(err).toHaveProperty("message", "Row 0 contains a non-numeric value");
  });

  test("rejects ragged rows", () => {
    const err = thrownBy(() => toInflammationTable([[1, 2], [3]]));
    expect(isDomainError(err, "RaggedTable")).toBe(true);
  });
});
