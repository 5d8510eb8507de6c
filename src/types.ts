/**
 * Inflammation measurements for a cohort.
 *
 * Rows are patients and columns are days. Every row has the same length, and
 * the caller decides the order of both axes; nothing in this package reorders
 * them.
 */
export type InflammationTable = ReadonlyArray<ReadonlyArray<number>>;

/**
 * One value per day, in column order.
 */
export type DailySeries = number[];

/**
 * A table row paired with the patient name it belongs to.
 *
 * Produced by `attachNames(...)`.
 */
export type NamedPatientRecord = {
  name: string;
  data: ReadonlyArray<number>;
};

/**
 * All per-day aggregates for a single day.
 *
 * Used by `summariseDays(...)` so callers that chart or report the cohort get
 * the four daily statistics in one pass over the table.
 */
export type DailySummary = {
  day: number;
  mean: number;
  max: number;
  min: number;
  std: number;
};
