// app/lib/preprocess.ts
import { DEFAULT_CONFIG, type PipelineConfig } from "./config";
import { encode } from "./encode";
import type { DegenerateColumnError, ZeroVarianceError } from "./errors";
import { impute } from "./impute";
import { scale } from "./scale";
import type { Table } from "./table";
import { classify } from "./typeInference";

export type PreprocessOptions = Partial<Pick<PipelineConfig, "columnPolicy" | "indicatorSeparator">>;

export type ColumnIssue = DegenerateColumnError | ZeroVarianceError;

export type PreprocessResult = {
  prepared: Table;
  /** Always empty under the "fail" policy. */
  issues: ColumnIssue[];
};

/**
 * Impute -> encode -> scale, producing a new fully numeric table.
 *
 * Under the "fail" policy the first column issue is thrown. Under "skip",
 * degenerate columns are dropped and zero-variance columns are kept unscaled;
 * the issues are returned and logged. A name collision always throws.
 */
export function runPreprocessing(raw: Table, options: PreprocessOptions = {}): PreprocessResult {
  const policy = options.columnPolicy ?? DEFAULT_CONFIG.columnPolicy;
  const separator = options.indicatorSeparator ?? DEFAULT_CONFIG.indicatorSeparator;

  const imputed = impute(raw);
  if (policy === "fail" && imputed.issues.length) throw imputed.issues[0];

  const degenerate = new Set(imputed.issues.map((i) => i.column));
  const kept = imputed.table.select(imputed.table.columnNames().filter((n) => !degenerate.has(n)));

  // measured before encoding so indicators never get scaled
  const measured = kept
    .columns()
    .filter((c) => classify(c) === "numerical" && !c.origin)
    .map((c) => c.name);

  const encoded = encode(kept, { separator });
  const scaled = scale(encoded, measured);
  if (policy === "fail" && scaled.issues.length) throw scaled.issues[0];

  const issues: ColumnIssue[] = [...imputed.issues, ...scaled.issues];
  for (const issue of issues) console.warn("COLUMN SKIPPED:", issue.message);

  return { prepared: scaled.table, issues };
}

export function preprocess(raw: Table, options: PreprocessOptions = {}): Table {
  return runPreprocessing(raw, options).prepared;
}
