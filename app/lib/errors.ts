// app/lib/errors.ts

export type ErrorCode =
  | "DEGENERATE_COLUMN"
  | "NAME_COLLISION"
  | "ZERO_VARIANCE"
  | "UNKNOWN_COLUMN"
  | "UNSUPPORTED_VISUALIZATION"
  | "INVALID_TABLE"
  | "LOAD_FAILED";

/**
 * Base class for every failure the pipeline reports.
 * `column` and `operation` tell the caller what to change before retrying.
 */
export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly column?: string;
  readonly operation: string;
  readonly hint?: string;

  constructor(
    code: ErrorCode,
    message: string,
    details: { operation: string; column?: string; hint?: string }
  ) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.operation = details.operation;
    this.column = details.column;
    this.hint = details.hint;
  }

  format(): string {
    const lines = [`error[${this.code}]: ${this.message}`];
    if (this.column !== undefined) lines.push(`  --> column '${this.column}' (${this.operation})`);
    if (this.hint) lines.push(`help: ${this.hint}`);
    return lines.join("\n");
  }
}

export class DegenerateColumnError extends PipelineError {
  constructor(column: string, operation = "impute") {
    super("DEGENERATE_COLUMN", `column '${column}' has no non-missing values`, {
      operation,
      column,
      hint: "drop the column or use the 'skip' column policy",
    });
    this.name = "DegenerateColumnError";
  }
}

export class NameCollisionError extends PipelineError {
  readonly collidingName: string;

  constructor(column: string, collidingName: string) {
    super("NAME_COLLISION", `encoding '${column}' produces duplicate column '${collidingName}'`, {
      operation: "encode",
      column,
      hint: "rename the column or choose another indicator separator",
    });
    this.name = "NameCollisionError";
    this.collidingName = collidingName;
  }
}

export class ZeroVarianceError extends PipelineError {
  constructor(column: string) {
    super("ZERO_VARIANCE", `column '${column}' has zero variance and cannot be scaled`, {
      operation: "scale",
      column,
      hint: "constant columns carry no signal; drop it or use the 'skip' column policy",
    });
    this.name = "ZeroVarianceError";
  }
}

export class UnknownColumnError extends PipelineError {
  readonly available: string[];

  constructor(ref: string | number, available: string[], operation = "lookup") {
    const hint =
      available.length > 0
        ? `available columns are: ${available.map((c) => `'${c}'`).join(", ")}`
        : "table has no columns";
    const label = typeof ref === "number" ? `#${ref}` : ref;

    super("UNKNOWN_COLUMN", `column '${label}' does not exist`, {
      operation,
      column: String(ref),
      hint,
    });
    this.name = "UnknownColumnError";
    this.available = available;
  }
}

export class UnsupportedVisualizationError extends PipelineError {
  constructor(operation: string, columns: string[], reason: string) {
    super("UNSUPPORTED_VISUALIZATION", `${operation} is not available for ${columns.join(" x ")}: ${reason}`, {
      operation,
      column: columns[0],
    });
    this.name = "UnsupportedVisualizationError";
  }
}

export class InvalidTableError extends PipelineError {
  constructor(message: string, column?: string) {
    super("INVALID_TABLE", message, { operation: "table", column });
    this.name = "InvalidTableError";
  }
}

export class LoadError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("LOAD_FAILED", message, { operation: "load" });
    this.name = "LoadError";
    this.path = path;
  }
}
