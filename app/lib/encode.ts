// app/lib/encode.ts
import { DEFAULT_CONFIG } from "./config";
import { NameCollisionError } from "./errors";
import { distinctInOrder } from "./stats";
import { Table, numericColumn, type Column, type StringColumn } from "./table";

export type EncodeOptions = {
  separator?: string;
};

export function indicatorName(column: string, category: string, separator = DEFAULT_CONFIG.indicatorSeparator) {
  return `${column}${separator}${category}`;
}

function expand(col: StringColumn, separator: string): Column[] {
  return distinctInOrder(col.values).map((category) =>
    numericColumn(
      indicatorName(col.name, category, separator),
      col.values.map((v) => (v === category ? 1 : 0)),
      "integer",
      { source: col.name, category }
    )
  );
}

/**
 * One-hot encoding: each categorical column is replaced, where it stood, by one
 * 0/1 indicator per distinct value (first-occurrence order). Numerical columns pass through.
 * A missing cell yields 0 in every indicator.
 */
export function encode(table: Table, options: EncodeOptions = {}): Table {
  const separator = options.separator ?? DEFAULT_CONFIG.indicatorSeparator;

  const out: Column[] = [];
  const taken = new Map<string, string>();

  for (const col of table.columns()) {
    const produced = col.storage === "string" ? expand(col, separator) : [col];

    for (const c of produced) {
      const owner = taken.get(c.name);
      if (owner !== undefined) {
        // blame whichever side of the clash is the categorical expansion
        throw new NameCollisionError(col.storage === "string" ? col.name : owner, c.name);
      }
      taken.set(c.name, col.name);
      out.push(c);
    }
  }

  return new Table(out);
}
