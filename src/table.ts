import { DomainError } from "./errors";
import type { InflammationTable } from "./types";

/**
 * Number of patients (rows).
 */
export function rowCount(table: InflammationTable): number {
  return table.length;
}

/**
 * Number of days (columns).
 *
 * Taken from the first row; every other row must match it. A table with no
 * rows has zero days.
 */
export function dayCount(table: InflammationTable): number {
  if (table.length === 0) return 0;

  const days = table[0].length;
  for (let i = 1; i < table.length; i += 1) {
    if (table[i].length !== days) {
      throw new DomainError(
        "RaggedTable",
        `Row ${i} has ${table[i].length} days, expected ${days}`
      );
    }
  }
  return days;
}

function isNumberRow(row: unknown[]): row is number[] {
  return row.every((v) => typeof v === "number");
}

/**
 * Checks a value from an untyped source (a loader, parsed JSON) and returns
 * it as an inflammation table.
 *
 * Only real numbers are accepted. NaN passes through unchanged because the
 * statistics treat it explicitly; numeric strings are rejected rather than
 * coerced.
 */
export function toInflammationTable(value: unknown): InflammationTable {
  if (!Array.isArray(value)) {
    throw new DomainError("MalformedTable", "Table must be an array of rows");
  }

  const rows: number[][] = [];
  value.forEach((row: unknown, i) => {
    if (!Array.isArray(row)) {
      throw new DomainError("MalformedTable", `Row ${i} is not an array`);
    }
    if (!isNumberRow(row)) {
      throw new DomainError(
        "MalformedTable",
        `Row ${i} contains a non-numeric value`
      );
    }
    rows.push(row);
  });

  dayCount(rows);
  return rows;
}
