import { DomainError } from "./errors";
import { dayCount } from "./table";
import type {
  DailySeries,
  DailySummary,
  InflammationTable,
  NamedPatientRecord,
} from "./types";

/**
 * Applies `fn` to every column and collects the results in column order.
 */
function mapColumns(
  table: InflammationTable,
  fn: (column: number[]) => number
): DailySeries {
  const days = dayCount(table);
  const out: DailySeries = [];
  for (let d = 0; d < days; d += 1) {
    out.push(fn(table.map((row) => row[d])));
  }
  return out;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

// Population standard deviation (divides by N).
function std(values: number[]): number {
  const m = mean(values);
  const squaredDiffs = values.map((v) => Math.pow(v - m, 2));
  return Math.sqrt(mean(squaredDiffs));
}

/**
 * Mean inflammation per day across all patients.
 *
 * NaN entries are not skipped: a NaN anywhere in a column makes that day NaN.
 */
export function dailyMean(table: InflammationTable): DailySeries {
  return mapColumns(table, mean);
}

/**
 * Maximum inflammation per day across all patients.
 */
export function dailyMax(table: InflammationTable): DailySeries {
  return mapColumns(table, (column) =>
    column.reduce((a, b) => Math.max(a, b))
  );
}

/**
 * Minimum inflammation per day across all patients.
 */
export function dailyMin(table: InflammationTable): DailySeries {
  return mapColumns(table, (column) =>
    column.reduce((a, b) => Math.min(a, b))
  );
}

/**
 * Population standard deviation per day across all patients.
 */
export function dailyStd(table: InflammationTable): DailySeries {
  return mapColumns(table, std);
}

/**
 * Every daily aggregate, one record per day.
 *
 * Values equal `dailyMean`, `dailyMax`, `dailyMin` and `dailyStd` at the same
 * index.
 */
export function summariseDays(table: InflammationTable): DailySummary[] {
  const means = dailyMean(table);
  const maxes = dailyMax(table);
  const mins = dailyMin(table);
  const stds = dailyStd(table);

  return means.map((m, day) => ({
    day,
    mean: m,
    max: maxes[day],
    min: mins[day],
    std: stds[day],
  }));
}

/**
 * Row maximum ignoring NaN entries; NaN when the row has no numeric entry.
 */
function nanMax(row: ReadonlyArray<number>): number {
  let max = Number.NaN;
  for (const v of row) {
    if (Number.isNaN(v)) continue;
    if (Number.isNaN(max) || v > max) max = v;
  }
  return max;
}

/**
 * Scales each patient's row by that patient's own maximum.
 *
 * - Throws `DomainError("NegativeValue")` before computing anything if any
 *   entry in the table is negative.
 * - The row maximum ignores NaN entries.
 * - A result that is NaN (all-zero row, all-NaN row, NaN entry) becomes 0.
 * - A negative result is clamped to 0.
 *
 * Returns a new table; the input is left untouched.
 */
export function patientNormalise(table: InflammationTable): number[][] {
  dayCount(table);

  table.forEach((row, i) => {
    const d = row.findIndex((v) => v < 0);
    if (d !== -1) {
      throw new DomainError(
        "NegativeValue",
        `Inflammation values should not be negative (patient ${i}, day ${d}: ${row[d]})`
      );
    }
  });

  return table.map((row) => {
    const max = nanMax(row);
    return row.map((v) => {
      const scaled = v / max;
      if (Number.isNaN(scaled)) return 0;
      if (scaled < 0) return 0;
      return scaled;
    });
  });
}

/**
 * Counts the days on which one patient's value is strictly above `threshold`.
 *
 * `rowIndex` may be negative to count back from the last patient (-1 is the
 * last row). Throws `RangeError` for a non-integer or out-of-range index.
 */
export function dailyAboveThreshold(
  rowIndex: number,
  table: InflammationTable,
  threshold: number
): number {
  const row = Number.isInteger(rowIndex) ? table.at(rowIndex) : undefined;
  if (row === undefined) {
    throw new RangeError(
      `Row index ${rowIndex} is out of range for a table with ${table.length} rows`
    );
  }

  return row
    .map((v) => v > threshold)
    .reduce((count, above) => (above ? count + 1 : count), 0);
}

/**
 * Pairs each row with the patient name at the same position.
 *
 * Throws `DomainError("LengthMismatch")` when the counts differ.
 */
export function attachNames(
  table: InflammationTable,
  names: ReadonlyArray<string>
): NamedPatientRecord[] {
  if (names.length !== table.length) {
    throw new DomainError(
      "LengthMismatch",
      `Got ${names.length} names for ${table.length} patients`
    );
  }

  return table.map((data, i) => ({ name: names[i], data }));
}
