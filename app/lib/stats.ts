// app/lib/stats.ts
import type { CellValue } from "./table";

/* ============================================================
   Series extraction
============================================================ */

export function presentNumbers(values: readonly CellValue[]): number[] {
  const out: number[] = [];
  for (const v of values) if (typeof v === "number" && Number.isFinite(v)) out.push(v);
  return out;
}

/** Category key of a cell; numbers are keyed by their string form. */
export function categoryKey(v: CellValue): string | null {
  if (v === null) return null;
  return typeof v === "number" ? (Number.isNaN(v) ? null : String(v)) : v;
}

/** Indices of rows where every listed series has a value. */
export function completeRows(...series: ReadonlyArray<readonly CellValue[]>): number[] {
  const n = series[0]?.length ?? 0;
  const rows: number[] = [];
  for (let i = 0; i < n; i++) {
    if (series.every((s) => categoryKey(s[i] ?? null) !== null)) rows.push(i);
  }
  return rows;
}

/** Distinct categories in first-occurrence order. */
export function distinctInOrder(values: readonly CellValue[]): string[] {
  const seen = new Set<string>();
  for (const v of values) {
    const k = categoryKey(v);
    if (k !== null) seen.add(k);
  }
  return Array.from(seen);
}

export type ValueCount = { value: string; count: number };

/** Counts sorted by count desc; equal counts keep first-occurrence order. */
export function valueCounts(values: readonly CellValue[]): ValueCount[] {
  const freq = new Map<string, number>();
  for (const v of values) {
    const k = categoryKey(v);
    if (k === null) continue;
    freq.set(k, (freq.get(k) ?? 0) + 1);
  }
  // Array.prototype.sort is stable
  return Array.from(freq.entries())
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
}

/** Most frequent value; ties go to the value seen first. */
export function mode(values: readonly (string | null)[]): string | null {
  const freq = new Map<string, number>();
  for (const v of values) if (v !== null) freq.set(v, (freq.get(v) ?? 0) + 1);

  let best: string | null = null;
  let bestCount = 0;
  for (const [value, count] of freq) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/* ============================================================
   Moments
============================================================ */

export function mean(xs: readonly number[]): number | null {
  if (!xs.length) return null;
  let s = 0;
  for (const x of xs) s += x;
  return s / xs.length;
}

/** Sample standard deviation (n - 1); null below two values. */
export function sampleStdev(xs: readonly number[], m = mean(xs)): number | null {
  if (xs.length < 2 || m === null) return null;
  let sumSq = 0;
  for (const x of xs) sumSq += (x - m) ** 2;
  return Math.sqrt(sumSq / (xs.length - 1));
}

/* ============================================================
   Sorted series
============================================================ */

/** Ascending, finite numbers. Built once per chart and shared by the helpers below. */
export type SortedSeries = readonly number[];

export function sortAscending(xs: readonly number[]): SortedSeries {
  // typed arrays sort numerically without a comparator
  return Array.from(Float64Array.from(xs.filter((v) => Number.isFinite(v))).sort());
}

/** First index whose value is >= x. */
function lowerBound(sorted: SortedSeries, x: number) {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First index whose value is > x. */
function upperBound(sorted: SortedSeries, x: number) {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Linear interpolation between the closest ranks. */
export function quantileSorted(sorted: SortedSeries, q: number): number | null {
  if (!sorted.length) return null;
  const pos = (sorted.length - 1) * q;
  const lo = sorted[Math.floor(pos)];
  const hi = sorted[Math.ceil(pos)];
  return lo + (hi - lo) * (pos - Math.floor(pos));
}

export type NumericSummary = {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  q25: number | null;
  median: number | null;
  q75: number | null;
  max: number | null;
};

export function summarize(xs: readonly number[]): NumericSummary {
  return summarizeSorted(sortAscending(xs));
}

export function summarizeSorted(sorted: SortedSeries): NumericSummary {
  const m = mean(sorted);
  return {
    count: sorted.length,
    mean: m,
    std: sampleStdev(sorted, m),
    min: sorted.length ? sorted[0] : null,
    q25: quantileSorted(sorted, 0.25),
    median: quantileSorted(sorted, 0.5),
    q75: quantileSorted(sorted, 0.75),
    max: sorted.length ? sorted[sorted.length - 1] : null,
  };
}

/* ============================================================
   Histogram + density
============================================================ */

const BIN_STEPS: ReadonlyArray<readonly [maxRows: number, bins: number]> = [
  [30, 8],
  [200, 10],
  [1000, 12],
];

export function chooseBins(n: number) {
  return BIN_STEPS.find(([maxRows]) => n <= maxRows)?.[1] ?? 14;
}

export type Histogram = {
  min: number;
  max: number;
  edges: number[];
  counts: number[];
  total: number;
};

/** Equal-width bins over [min, max]; the last bin also takes the maximum. */
export function computeHistogram(sorted: SortedSeries, bins: number): Histogram | null {
  if (!sorted.length) return null;

  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  const span = max - min || 1;
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + (span * i) / bins);

  // each interior edge splits the sorted series
  const counts: number[] = [];
  let start = 0;
  for (let b = 1; b < bins; b++) {
    const end = lowerBound(sorted, edges[b]);
    counts.push(end - start);
    start = end;
  }
  counts.push(sorted.length - start);

  return { min, max, edges, counts, total: sorted.length };
}

export type DensityPoint = { x: number; density: number };

/**
 * Gaussian kernel density over [min, max] with Scott's bandwidth.
 * Null when the sample cannot define a bandwidth (fewer than two values, or constant).
 */
export function kernelDensity(sorted: SortedSeries, points: number): DensityPoint[] | null {
  const n = sorted.length;
  const sd = sampleStdev(sorted);
  if (sd === null || sd === 0 || points < 2) return null;

  const h = sd * Math.pow(n, -1 / 5);
  const min = sorted[0];
  const max = sorted[n - 1];
  const norm = 1 / (n * h * Math.sqrt(2 * Math.PI));
  // terms past 8 bandwidths are below 1e-13 of the peak
  const reach = 8 * h;

  const out: DensityPoint[] = [];
  for (let i = 0; i < points; i++) {
    const x = min + ((max - min) * i) / (points - 1);
    const end = upperBound(sorted, x + reach);
    let s = 0;
    for (let j = lowerBound(sorted, x - reach); j < end; j++) {
      const u = (x - sorted[j]) / h;
      s += Math.exp(-0.5 * u * u);
    }
    out.push({ x, density: s * norm });
  }
  return out;
}

/* ============================================================
   Box summary
============================================================ */

export type BoxSummary = {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  iqr: number;
  outliers: number[];
  total: number;
};

/** Tukey box: whiskers at the furthest values within 1.5 IQR of the quartiles. */
export function computeBox(sorted: SortedSeries): BoxSummary | null {
  const q1 = quantileSorted(sorted, 0.25);
  const median = quantileSorted(sorted, 0.5);
  const q3 = quantileSorted(sorted, 0.75);
  if (q1 === null || median === null || q3 === null) return null;

  const iqr = q3 - q1;
  // the quartiles sit inside the fences, so first <= last
  const first = lowerBound(sorted, q1 - 1.5 * iqr);
  const last = upperBound(sorted, q3 + 1.5 * iqr) - 1;

  return {
    min: sorted[first],
    q1,
    median,
    q3,
    max: sorted[last],
    iqr,
    outliers: sorted.slice(0, first).concat(sorted.slice(last + 1)),
    total: sorted.length,
  };
}

/* ============================================================
   Relationship
============================================================ */

export function pearson(x: readonly number[], y: readonly number[]) {
  if (x.length !== y.length || x.length < 2) return null;
  const mx = mean(x) ?? 0;
  const my = mean(y) ?? 0;

  let num = 0;
  let dx = 0;
  let dy = 0;

  for (let i = 0; i < x.length; i++) {
    const a = x[i] - mx;
    const b = y[i] - my;
    num += a * b;
    dx += a * a;
    dy += b * b;
  }

  const den = Math.sqrt(dx * dy);
  if (!Number.isFinite(den) || den === 0) return null;

  const r = num / den;
  return Number.isFinite(r) ? r : null;
}
