// app/lib/scale.ts
import { ZeroVarianceError } from "./errors";
import { mean, presentNumbers, sampleStdev } from "./stats";
import { Table, numericColumn, type Column } from "./table";

export type ScaleResult = {
  table: Table;
  /** Columns passed through unscaled because their standard deviation is zero or undefined. */
  issues: ZeroVarianceError[];
};

/**
 * z-score scaling with the sample standard deviation, applied to the named
 * columns only. Indicator columns are never scaled.
 */
export function scale(table: Table, columns: readonly string[]): ScaleResult {
  for (const name of columns) table.column(name, "scale");
  const targets = new Set(columns);
  const issues: ZeroVarianceError[] = [];

  const out = table.columns().map((col): Column => {
    if (!targets.has(col.name) || col.storage === "string" || col.origin) return col;

    const nums = presentNumbers(col.values);
    const m = mean(nums);
    const sd = sampleStdev(nums, m);
    if (m === null || sd === null || sd === 0) {
      issues.push(new ZeroVarianceError(col.name));
      return col;
    }

    return numericColumn(
      col.name,
      col.values.map((v) => (v === null ? null : (v - m) / sd)),
      "float"
    );
  });

  return { table: new Table(out), issues };
}
