// app/lib/impute.ts
import { DegenerateColumnError } from "./errors";
import { mean, mode, presentNumbers } from "./stats";
import { Table, numericColumn, stringColumn, type Column } from "./table";

export type ImputeResult = {
  table: Table;
  /** Columns left untouched because no fill value exists. */
  issues: DegenerateColumnError[];
};

function fillColumn(col: Column): Column | DegenerateColumnError {
  if (col.storage === "string") {
    if (!col.values.includes(null)) return col;
    const fill = mode(col.values);
    if (fill === null) return new DegenerateColumnError(col.name);
    return stringColumn(
      col.name,
      col.values.map((v) => v ?? fill)
    );
  }

  if (!col.values.includes(null)) return col;
  const fill = mean(presentNumbers(col.values));
  if (fill === null) return new DegenerateColumnError(col.name);

  const storage = col.storage === "integer" && !Number.isInteger(fill) ? "float" : col.storage;
  return numericColumn(
    col.name,
    col.values.map((v) => v ?? fill),
    storage,
    col.origin
  );
}

/**
 * Numerical columns get their mean, categorical columns their mode.
 * A column with nothing to compute from is reported and left as is.
 */
export function impute(table: Table): ImputeResult {
  const issues: DegenerateColumnError[] = [];
  const columns = table.columns().map((col) => {
    const filled = fillColumn(col);
    if (filled instanceof DegenerateColumnError) {
      issues.push(filled);
      return col;
    }
    return filled;
  });

  return { table: new Table(columns), issues };
}
