// app/lib/charts.ts
// Picks a chart strategy from the requested kind and the column type signature(s),
// and prepares the series a renderer needs. No drawing happens here.

import { paletteColor, resolveConfig, type PipelineConfig } from "./config";
import { UnsupportedVisualizationError } from "./errors";
import {
  chooseBins,
  completeRows,
  computeBox,
  computeHistogram,
  distinctInOrder,
  kernelDensity,
  pearson,
  presentNumbers,
  sortAscending,
  summarizeSorted,
  valueCounts,
  categoryKey,
  type BoxSummary,
  type NumericSummary,
} from "./stats";
import type { Column, ColumnRef, Table } from "./table";
import { classify } from "./typeInference";

/* ============================================================
   Requests
============================================================ */

export type PairedMode = "comparison" | "correlation";

export type VisualizationRequest =
  | { kind: "distribution"; column: ColumnRef }
  | { kind: "proportion"; column: ColumnRef }
  | { kind: "paired"; mode: PairedMode; x: ColumnRef; y: ColumnRef };

/* ============================================================
   Chart specs
============================================================ */

export type DataPoint = {
  x: number | string;
  y: number | string;
  label?: string;
  /** Jitter along the category axis (strip layout). */
  offset?: number;
};

export type SeriesData = {
  name: string;
  color?: string;
  points: DataPoint[];
};

type SpecBase = {
  title: string;
  xLabel: string;
  yLabel: string;
  /** Table columns the spec was built from. */
  columns: string[];
  series: SeriesData[];
};

export type Orientation = "vertical" | "horizontal";

export type FrequencyBarSpec = SpecBase & {
  strategy: "frequency-bar";
  column: string;
  total: number;
};

export type DensityHistogramSpec = SpecBase & {
  strategy: "density-histogram";
  column: string;
  bins: number;
  edges: number[];
  summary: NumericSummary;
};

export type BoxGroup = {
  name: string;
  color: string;
  box: BoxSummary | null;
};

export type GroupedBoxSpec = SpecBase & {
  strategy: "grouped-box";
  orientation: Orientation;
  groupColumn: string;
  valueColumn: string;
  groups: BoxGroup[];
};

export type BoxSpec = SpecBase & {
  strategy: "box";
  groups: BoxGroup[];
};

export type CategoryScatterSpec = SpecBase & {
  strategy: "category-scatter";
  hueColumn: string;
};

export type StripSpec = SpecBase & {
  strategy: "strip";
  orientation: Orientation;
  groupColumn: string;
  valueColumn: string;
  jitterWidth: number;
};

export type ScatterSpec = SpecBase & {
  strategy: "scatter";
  correlation: number | null;
};

export type PieSlice = {
  label: string;
  count: number;
  pct: number;
  color: string;
};

export type PieSpec = SpecBase & {
  strategy: "pie";
  column: string;
  total: number;
  startAngle: number;
  slices: PieSlice[];
};

export type ChartSpec =
  | FrequencyBarSpec
  | DensityHistogramSpec
  | GroupedBoxSpec
  | BoxSpec
  | CategoryScatterSpec
  | StripSpec
  | ScatterSpec
  | PieSpec;

export type ChartStrategy = ChartSpec["strategy"];

/* ============================================================
   Helpers
============================================================ */

type Signature = "C" | "N";

function signatureOf(col: Column): Signature {
  return classify(col) === "categorical" ? "C" : "N";
}

type Build = { x: Column; y: Column; config: PipelineConfig };

type Grouping = {
  categorical: Column;
  numerical: Column;
  orientation: Orientation;
};

function grouping(x: Column, y: Column): Grouping {
  return signatureOf(x) === "C"
    ? { categorical: x, numerical: y, orientation: "vertical" }
    : { categorical: y, numerical: x, orientation: "horizontal" };
}

/** Numeric values per category, categories in first-occurrence order among complete rows. */
function groupValues(categorical: Column, numerical: Column) {
  const rows = completeRows(categorical.values, numerical.values);
  const categories = distinctInOrder(rows.map((i) => categorical.values[i]));
  const byCategory = new Map<string, number[]>(categories.map((c) => [c, []]));

  for (const i of rows) {
    const key = categoryKey(categorical.values[i]);
    const v = numerical.values[i];
    if (key === null || typeof v !== "number") continue;
    byCategory.get(key)?.push(v);
  }
  return categories.map((name) => ({ name, values: byCategory.get(name) ?? [] }));
}

/** Deterministic spread in [-width/2, width/2): golden-ratio sequence over the point's rank in its group. */
export function jitterOffset(rank: number, width: number) {
  const frac = ((rank + 1) * 0.6180339887498949) % 1;
  return (frac - 0.5) * width;
}

function orient(orientation: Orientation, category: string, value: number): DataPoint {
  return orientation === "vertical" ? { x: category, y: value } : { x: value, y: category };
}

function pairTitle(x: Column, y: Column, what: string) {
  return `${x.name} vs ${y.name} ${what}`;
}

/* ============================================================
   Strategies
============================================================ */

function frequencyBar({ x, config }: Build): FrequencyBarSpec {
  const counts = valueCounts(x.values);
  return {
    strategy: "frequency-bar",
    title: `${x.name} Histogram`,
    xLabel: x.name,
    yLabel: "Count",
    columns: [x.name],
    column: x.name,
    total: counts.reduce((a, c) => a + c.count, 0),
    series: [
      {
        name: x.name,
        color: paletteColor(config.groupPalette, 0),
        points: counts.map((c) => ({ x: c.value, y: c.count, label: String(c.count) })),
      },
    ],
  };
}

function densityHistogram({ x, config }: Build): DensityHistogramSpec {
  const sorted = sortAscending(presentNumbers(x.values));
  const bins = config.histogramBins ?? chooseBins(sorted.length);
  const hist = computeHistogram(sorted, bins);

  const series: SeriesData[] = [];
  if (hist) {
    const width = (hist.max - hist.min || 1) / bins;
    series.push({
      name: "count",
      color: paletteColor(config.groupPalette, 0),
      points: hist.counts.map((count, i) => ({ x: hist.edges[i] + width / 2, y: count })),
    });

    // density rescaled to the count axis
    const density = kernelDensity(sorted, config.densityPoints);
    if (density) {
      series.push({
        name: "density",
        color: paletteColor(config.groupPalette, 0),
        points: density.map((p) => ({ x: p.x, y: p.density * hist.total * width })),
      });
    }
  }

  return {
    strategy: "density-histogram",
    title: `${x.name} Histogram`,
    xLabel: x.name,
    yLabel: "Frequency",
    columns: [x.name],
    column: x.name,
    bins,
    edges: hist?.edges ?? [],
    summary: summarizeSorted(sorted),
    series,
  };
}

function groupedBox({ x, y, config }: Build): GroupedBoxSpec {
  const { categorical, numerical, orientation } = grouping(x, y);
  const groups = groupValues(categorical, numerical);

  return {
    strategy: "grouped-box",
    title: pairTitle(x, y, "Boxplot"),
    xLabel: x.name,
    yLabel: y.name,
    columns: [x.name, y.name],
    orientation,
    groupColumn: categorical.name,
    valueColumn: numerical.name,
    groups: groups.map((g, i) => ({
      name: g.name,
      color: paletteColor(config.groupPalette, i),
      box: computeBox(sortAscending(g.values)),
    })),
    series: groups.map((g, i) => ({
      name: g.name,
      color: paletteColor(config.groupPalette, i),
      points: g.values.map((v) => orient(orientation, g.name, v)),
    })),
  };
}

function box({ x, y, config }: Build): BoxSpec {
  const cols = [x, y];
  return {
    strategy: "box",
    title: pairTitle(x, y, "Boxplot"),
    xLabel: x.name,
    yLabel: y.name,
    columns: [x.name, y.name],
    groups: cols.map((c, i) => ({
      name: c.name,
      color: paletteColor(config.groupPalette, i),
      box: computeBox(sortAscending(presentNumbers(c.values))),
    })),
    series: cols.map((c, i) => ({
      name: c.name,
      color: paletteColor(config.groupPalette, i),
      points: presentNumbers(c.values).map((v) => ({ x: c.name, y: v })),
    })),
  };
}

function categoryScatter({ x, y, config }: Build): CategoryScatterSpec {
  const rows = completeRows(x.values, y.values);
  const categories = distinctInOrder(rows.map((i) => x.values[i]));

  const series = categories.map((name, rank): SeriesData => {
    const points: DataPoint[] = [];
    for (const i of rows) {
      const xk = categoryKey(x.values[i]);
      const yk = categoryKey(y.values[i]);
      if (xk === name && yk !== null) points.push({ x: xk, y: yk });
    }
    return { name, color: paletteColor(config.groupPalette, rank), points };
  });

  return {
    strategy: "category-scatter",
    title: pairTitle(x, y, "Scatterplot"),
    xLabel: x.name,
    yLabel: y.name,
    columns: [x.name, y.name],
    hueColumn: x.name,
    series,
  };
}

function strip({ x, y, config }: Build): StripSpec {
  const { categorical, numerical, orientation } = grouping(x, y);
  const groups = groupValues(categorical, numerical);
  const width = config.jitterWidth;

  return {
    strategy: "strip",
    title: pairTitle(x, y, "Scatterplot"),
    xLabel: x.name,
    yLabel: y.name,
    columns: [x.name, y.name],
    orientation,
    groupColumn: categorical.name,
    valueColumn: numerical.name,
    jitterWidth: width,
    series: groups.map((g, i) => ({
      name: g.name,
      color: paletteColor(config.groupPalette, i),
      points: g.values.map((v, rank) => ({ ...orient(orientation, g.name, v), offset: jitterOffset(rank, width) })),
    })),
  };
}

function scatter({ x, y }: Build): ScatterSpec {
  const rows = completeRows(x.values, y.values);
  const xs: number[] = [];
  const ys: number[] = [];
  for (const i of rows) {
    const a = x.values[i];
    const b = y.values[i];
    if (typeof a !== "number" || typeof b !== "number") continue;
    xs.push(a);
    ys.push(b);
  }

  return {
    strategy: "scatter",
    title: pairTitle(x, y, "Scatterplot"),
    xLabel: x.name,
    yLabel: y.name,
    columns: [x.name, y.name],
    correlation: pearson(xs, ys),
    series: [{ name: `${y.name} vs ${x.name}`, points: xs.map((a, i) => ({ x: a, y: ys[i] })) }],
  };
}

function pie({ x, config }: Build): PieSpec {
  const counts = valueCounts(x.values);
  const total = counts.reduce((a, c) => a + c.count, 0);

  const slices = counts.map((c, i): PieSlice => {
    const pct = total ? (c.count / total) * 100 : 0;
    return { label: c.value, count: c.count, pct, color: paletteColor(config.slicePalette, i) };
  });

  return {
    strategy: "pie",
    title: `${x.name} Pie Chart`,
    xLabel: x.name,
    yLabel: "Share",
    columns: [x.name],
    column: x.name,
    total,
    startAngle: 90,
    slices,
    series: [
      {
        name: x.name,
        points: slices.map((s) => ({ x: s.label, y: s.count, label: `${s.pct.toFixed(1)}%` })),
      },
    ],
  };
}

/* ============================================================
   Dispatch table
============================================================ */

type SingleKey = `${"distribution" | "proportion"}:${Signature}`;
type PairKey = `${PairedMode}:${Signature}${Signature}`;
export type DispatchKey = SingleKey | PairKey;

type Rule =
  | { strategy: ChartStrategy; build: (b: Build) => ChartSpec }
  | { strategy: null; unsupported: string };

const RULES: Record<DispatchKey, Rule> = {
  "distribution:C": { strategy: "frequency-bar", build: frequencyBar },
  "distribution:N": { strategy: "density-histogram", build: densityHistogram },
  "proportion:C": { strategy: "pie", build: pie },
  "proportion:N": { strategy: null, unsupported: "a pie chart needs a finite set of categories" },
  "comparison:CN": { strategy: "grouped-box", build: groupedBox },
  "comparison:NC": { strategy: "grouped-box", build: groupedBox },
  "comparison:NN": { strategy: "box", build: box },
  "comparison:CC": { strategy: null, unsupported: "a box plot needs a numerical axis" },
  "correlation:CC": { strategy: "category-scatter", build: categoryScatter },
  "correlation:CN": { strategy: "strip", build: strip },
  "correlation:NC": { strategy: "strip", build: strip },
  "correlation:NN": { strategy: "scatter", build: scatter },
};

const SIGNATURES: readonly Signature[] = ["C", "N"];

/** Every (kind, signature) combination with its strategy; null where unsupported. */
export function strategyTable(): Array<{ key: DispatchKey; strategy: ChartStrategy | null }> {
  const keys: DispatchKey[] = [];
  for (const kind of ["distribution", "proportion"] as const) {
    for (const s of SIGNATURES) keys.push(`${kind}:${s}`);
  }
  for (const mode of ["comparison", "correlation"] as const) {
    for (const a of SIGNATURES) for (const b of SIGNATURES) keys.push(`${mode}:${a}${b}`);
  }
  return keys.map((key) => ({ key, strategy: RULES[key].strategy }));
}

function dispatchKey(request: VisualizationRequest, x: Column, y: Column): DispatchKey {
  if (request.kind === "paired") return `${request.mode}:${signatureOf(x)}${signatureOf(y)}`;
  return `${request.kind}:${signatureOf(x)}`;
}

/* ============================================================
   Main
============================================================ */

export function resolveVisualization(
  table: Table,
  request: VisualizationRequest,
  options: Partial<PipelineConfig> = {}
): ChartSpec {
  const config = resolveConfig(options, {});

  const operation = request.kind === "paired" ? request.mode : request.kind;
  const x = table.column(request.kind === "paired" ? request.x : request.column, operation);
  const y = request.kind === "paired" ? table.column(request.y, operation) : x;

  const rule = RULES[dispatchKey(request, x, y)];
  if ("unsupported" in rule) {
    const cols = request.kind === "paired" ? [x.name, y.name] : [x.name];
    throw new UnsupportedVisualizationError(operation, cols, rule.unsupported);
  }
  return rule.build({ x, y, config });
}
