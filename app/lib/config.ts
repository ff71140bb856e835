// app/lib/config.ts

export type ColumnPolicy = "fail" | "skip";

export type PipelineConfig = {
  /** What a per-column failure (degenerate or zero-variance column) does to the pass. */
  columnPolicy: ColumnPolicy;
  /** Joins a categorical column name and a category into an indicator name. */
  indicatorSeparator: string;
  /** Colors for grouped series; reused in order once exhausted. */
  groupPalette: readonly string[];
  /** Colors for pie slices. */
  slicePalette: readonly string[];
  /** Fixed bin count for histograms; `null` picks one from the row count. */
  histogramBins: number | null;
  /** Points on which the density overlay is evaluated. */
  densityPoints: number;
  /** Total spread of strip-plot jitter, in category-axis units. */
  jitterWidth: number;
  debug: boolean;
};

// "deep" qualitative palette
const DEEP = [
  "#4c72b0",
  "#dd8452",
  "#55a868",
  "#c44e52",
  "#8172b3",
  "#937860",
  "#da8bc3",
  "#8c8c8c",
  "#ccb974",
  "#64b5cd",
] as const;

// "Set3" qualitative palette
const SET3 = [
  "#8dd3c7",
  "#ffffb3",
  "#bebada",
  "#fb8072",
  "#80b1d3",
  "#fdb462",
  "#b3de69",
  "#fccde5",
  "#d9d9d9",
  "#bc80bd",
  "#ccebc5",
  "#ffed6f",
] as const;

export const DEFAULT_CONFIG: PipelineConfig = {
  columnPolicy: "fail",
  indicatorSeparator: "_",
  groupPalette: DEEP,
  slicePalette: SET3,
  histogramBins: null,
  densityPoints: 100,
  jitterWidth: 0.4,
  debug: false,
};

type Env = Record<string, string | undefined>;

function policyFromEnv(v: string | undefined): ColumnPolicy | undefined {
  const s = String(v ?? "").trim().toLowerCase();
  if (s === "fail" || s === "skip") return s;
  return undefined;
}

function flagFromEnv(v: string | undefined): boolean | undefined {
  const s = String(v ?? "").trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return undefined;
}

/**
 * Defaults, then CHARTPREP_* environment variables, then explicit overrides.
 * Unrecognised environment values are ignored.
 */
export function resolveConfig(
  overrides: Partial<PipelineConfig> = {},
  env: Env = process.env
): PipelineConfig {
  const fromEnv: Partial<PipelineConfig> = {};

  const policy = policyFromEnv(env.CHARTPREP_COLUMN_POLICY);
  if (policy) fromEnv.columnPolicy = policy;

  const debug = flagFromEnv(env.CHARTPREP_DEBUG);
  if (debug !== undefined) fromEnv.debug = debug;

  const merged: PipelineConfig = { ...DEFAULT_CONFIG, ...fromEnv };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }

  if (!merged.groupPalette.length || !merged.slicePalette.length) {
    throw new Error("palettes must contain at least one color");
  }
  return merged;
}

/** Category of rank `i` gets palette[i], cycling once the palette runs out. */
export function paletteColor(palette: readonly string[], i: number): string {
  return palette[i % palette.length];
}
