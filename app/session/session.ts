// app/session/session.ts
import type { ChartSpec, VisualizationRequest } from "../lib/charts";
import { resolveVisualization } from "../lib/charts";
import { resolveConfig, type PipelineConfig } from "../lib/config";
import { PipelineError } from "../lib/errors";
import { runPreprocessing, type ColumnIssue, type PreprocessResult } from "../lib/preprocess";
import type { Table } from "../lib/table";

/* =========================
   TYPES
========================= */

/** Which table a request reads from. */
export type TableView = "raw" | "prepared";

export type Meta = {
  fileName?: string;
  fileType?: "csv" | "excel";
  sheetName?: string;
  rows: number;
  columns: number;
  missingValues: number;
};

export type DatasetSession = {
  readonly raw: Table;
  /** Throws the preprocessing failure, if there was one. */
  readonly prepared: Table;
  /** Throws the preprocessing failure, if there was one. */
  readonly issues: readonly ColumnIssue[];
  /** Why `prepared` is unavailable; the raw view works regardless. */
  readonly preprocessError: PipelineError | null;
  readonly meta: Meta;
  readonly config: PipelineConfig;

  table: (view: TableView) => Table;
  visualize: (view: TableView, request: VisualizationRequest) => ChartSpec;
};

/* =========================
   HELPERS
========================= */

function computeMissingValues(table: Table): number {
  let missing = 0;
  for (const col of table.columns()) {
    for (const v of col.values) if (v === null) missing += 1;
  }
  return missing;
}

/* =========================
   SESSION
========================= */

function tryPreprocessing(raw: Table, config: PipelineConfig): PreprocessResult | PipelineError {
  try {
    return runPreprocessing(raw, config);
  } catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
}

/**
 * Keeps `raw` and `prepared` alive together. Each request names the view it
 * targets, so nothing depends on what was visualized before. A table that
 * cannot be preprocessed still serves the raw view.
 */
export function createSession(
  raw: Table,
  options: { meta?: Partial<Meta>; config?: Partial<PipelineConfig> } = {}
): DatasetSession {
  const config = resolveConfig(options.config);
  const outcome = tryPreprocessing(raw, config);
  const result = outcome instanceof PipelineError ? null : outcome;
  const preprocessError = outcome instanceof PipelineError ? outcome : null;

  const preparation = (): PreprocessResult => {
    if (outcome instanceof PipelineError) throw outcome;
    return outcome;
  };

  const meta: Meta = {
    ...options.meta,
    rows: raw.rowCount,
    columns: raw.columnCount,
    missingValues: computeMissingValues(raw),
  };

  if (config.debug) {
    console.log("SETTING DATASET", {
      file: meta.fileName,
      rows: meta.rows,
      cols: meta.columns,
      preparedCols: result?.prepared.columnCount ?? null,
      issues: result?.issues.length ?? null,
      failed: preprocessError?.code ?? null,
    });
  }

  const table = (view: TableView) => (view === "raw" ? raw : preparation().prepared);

  return {
    raw,
    get prepared() {
      return preparation().prepared;
    },
    get issues() {
      return preparation().issues;
    },
    preprocessError,
    meta,
    config,
    table,
    visualize: (view, request) => resolveVisualization(table(view), request, config),
  };
}
