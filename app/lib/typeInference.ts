// app/lib/typeInference.ts
import type { Column, ColumnRef, Table } from "./table";

export type ColumnType = "categorical" | "numerical";

/**
 * Classification follows the column's storage type only.
 * Numeric-looking strings stay categorical; an all-missing column keeps its storage type.
 */
export function classify(column: Column): ColumnType {
  return column.storage === "string" ? "categorical" : "numerical";
}

export function classifyColumn(table: Table, ref: ColumnRef): ColumnType {
  return classify(table.column(ref, "classify"));
}

export function columnsOfType(table: Table, type: ColumnType): string[] {
  return table
    .columns()
    .filter((c) => classify(c) === type)
    .map((c) => c.name);
}
