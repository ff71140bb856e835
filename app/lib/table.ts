// app/lib/table.ts
import { InvalidTableError, UnknownColumnError } from "./errors";
import { classify, type ColumnType } from "./typeInference";

/* ============================================================
   Types
============================================================ */

/** `null` is the Missing marker. */
export type CellValue = string | number | null;

export type StorageType = "string" | "integer" | "float";
export type NumericStorage = Exclude<StorageType, "string">;

/** Set on indicator columns produced by one-hot encoding. */
export type IndicatorOrigin = { source: string; category: string };

export type StringColumn = {
  readonly name: string;
  readonly storage: "string";
  readonly values: readonly (string | null)[];
  readonly origin?: undefined;
};

export type NumericColumn = {
  readonly name: string;
  readonly storage: NumericStorage;
  readonly values: readonly (number | null)[];
  readonly origin?: IndicatorOrigin;
};

export type Column = StringColumn | NumericColumn;

/** A column name, or its zero-based position. */
export type ColumnRef = string | number;

/* ============================================================
   Column builders
============================================================ */

export function stringColumn(name: string, values: readonly (string | null)[]): StringColumn {
  return { name, storage: "string", values };
}

/**
 * Numeric column; storage is `integer` when every present value is integral,
 * unless given explicitly.
 */
export function numericColumn(
  name: string,
  values: readonly (number | null)[],
  storage?: NumericStorage,
  origin?: IndicatorOrigin
): NumericColumn {
  const resolved =
    storage ?? (values.every((v) => v === null || Number.isNaN(v) || Number.isInteger(v)) ? "integer" : "float");
  return origin ? { name, storage: resolved, values, origin } : { name, storage: resolved, values };
}

function freezeColumn(col: Column): Column {
  if (col.storage === "string") {
    return Object.freeze({ ...col, values: Object.freeze([...col.values]) });
  }

  const values = col.values.map((v) => (v === null || Number.isNaN(v) ? null : v));
  if (col.storage === "integer") {
    const bad = values.find((v) => v !== null && !Number.isInteger(v));
    if (bad !== undefined) {
      throw new InvalidTableError(`integer column '${col.name}' holds non-integral value ${bad}`, col.name);
    }
  }
  return Object.freeze({ ...col, values: Object.freeze(values) });
}

/* ============================================================
   Table
============================================================ */

/**
 * Immutable rectangular table. Every transformation returns a new instance.
 */
export class Table {
  readonly rowCount: number;
  private readonly cols: readonly Column[];
  private readonly index: ReadonlyMap<string, number>;

  constructor(columns: readonly Column[]) {
    const index = new Map<string, number>();
    const frozen: Column[] = [];

    for (const col of columns) {
      if (index.has(col.name)) {
        throw new InvalidTableError(`duplicate column name '${col.name}'`, col.name);
      }
      index.set(col.name, frozen.length);
      frozen.push(freezeColumn(col));
    }

    const rowCount = frozen[0]?.values.length ?? 0;
    for (const col of frozen) {
      if (col.values.length !== rowCount) {
        throw new InvalidTableError(
          `column '${col.name}' has ${col.values.length} rows, expected ${rowCount}`,
          col.name
        );
      }
    }

    this.cols = Object.freeze(frozen);
    this.index = index;
    this.rowCount = rowCount;
  }

  get columnCount(): number {
    return this.cols.length;
  }

  /** Names in declaration order. */
  columnNames(): string[] {
    return this.cols.map((c) => c.name);
  }

  columns(): readonly Column[] {
    return this.cols;
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  column(ref: ColumnRef, operation = "lookup"): Column {
    const i = typeof ref === "number" ? ref : this.index.get(ref);
    const col = i === undefined || !Number.isInteger(i) ? undefined : this.cols[i];
    if (!col) throw new UnknownColumnError(ref, this.columnNames(), operation);
    return col;
  }

  columnType(ref: ColumnRef): ColumnType {
    return classify(this.column(ref));
  }

  values(ref: ColumnRef): readonly CellValue[] {
    return this.column(ref).values;
  }

  /** New table with the same columns in the given order; unlisted columns are dropped. */
  select(names: readonly string[]): Table {
    return new Table(names.map((n) => this.column(n, "select")));
  }
}

/* ============================================================
   From row records (loader output)
============================================================ */

function isMissing(v: unknown) {
  return (
    v === null ||
    v === undefined ||
    (typeof v === "number" && Number.isNaN(v)) ||
    (typeof v === "string" && v.trim() === "")
  );
}

function asText(v: unknown): string {
  if (v instanceof Date) return v.toISOString();
  if (typeof v === "object" && v !== null) return JSON.stringify(v);
  return String(v);
}

/**
 * Storage per column follows the runtime types the loader produced:
 * all finite numbers -> integer/float, nothing present -> float, otherwise string.
 */
export function tableFromRecords(
  rows: readonly Record<string, unknown>[],
  columnOrder?: readonly string[]
): Table {
  const names: string[] = [];
  if (columnOrder) names.push(...columnOrder);
  else {
    const seen = new Set<string>();
    for (const row of rows) {
      for (const k of Object.keys(row)) {
        if (!seen.has(k)) {
          seen.add(k);
          names.push(k);
        }
      }
    }
  }

  const columns = names.map((name): Column => {
    const raw = rows.map((row) => row[name]);
    const present = raw.filter((v) => !isMissing(v));

    const allNumbers = present.every((v) => typeof v === "number" && Number.isFinite(v));
    if (allNumbers) {
      const nums = raw.map((v) => (typeof v === "number" && Number.isFinite(v) ? v : null));
      return numericColumn(name, nums, present.length ? undefined : "float");
    }

    return stringColumn(
      name,
      raw.map((v) => (isMissing(v) ? null : asText(v)))
    );
  });

  return new Table(columns);
}
