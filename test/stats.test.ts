import { describe, expect, it } from "vitest";
import {
  chooseBins,
  completeRows,
  computeBox,
  computeHistogram,
  distinctInOrder,
  kernelDensity,
  mode,
  pearson,
  presentNumbers,
  quantileSorted,
  sampleStdev,
  sortAscending,
  summarize,
  valueCounts,
} from "@/app/lib/stats";

/* EXTRACTION
/*----------------------------------------------------- */

describe("series extraction", () => {
  it("should keep only finite numbers", () => {
    expect(presentNumbers([1, null, "x", 2.5])).toEqual([1, 2.5]);
  });

  it("should list distinct values in first-occurrence order", () => {
    expect(distinctInOrder(["b", null, "a", "b", "c"])).toEqual(["b", "a", "c"]);
  });

  it("should count values, most frequent first, ties in first-occurrence order", () => {
    expect(valueCounts(["b", "a", "c", "a", null, "b", "d"])).toEqual([
      { value: "b", count: 2 },
      { value: "a", count: 2 },
      { value: "c", count: 1 },
      { value: "d", count: 1 },
    ]);
  });

  it("should find rows complete across several series", () => {
    expect(completeRows([1, null, 3, 4], ["a", "b", null, "d"])).toEqual([0, 3]);
  });

  it("should pick the mode with first-occurrence tie break", () => {
    expect(mode(["x", "y", "y", "x"])).toBe("x");
    expect(mode(["x", "y", "y"])).toBe("y");
    expect(mode([null, null])).toBeNull();
  });
});

/* MOMENTS
/*----------------------------------------------------- */

describe("summary statistics", () => {
  it("should sort ascending and drop non-finite values", () => {
    expect(sortAscending([3, -1, Number.NaN, 2, Infinity, 10])).toEqual([-1, 2, 3, 10]);
  });

  it("should interpolate quantiles linearly", () => {
    expect(quantileSorted([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantileSorted([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantileSorted([7], 0.9)).toBe(7);
    expect(quantileSorted([], 0.5)).toBeNull();
  });

  it("should use n - 1 for the standard deviation", () => {
    expect(sampleStdev([25, 30, 35])).toBe(5);
    expect(sampleStdev([4])).toBeNull();
  });

  it("should summarize a numeric series", () => {
    const s = summarize([4, 1, 3, 2]);

    expect(s.count).toBe(4);
    expect(s.mean).toBe(2.5);
    expect(s.std).toBeCloseTo(Math.sqrt(5 / 3), 12);
    expect(s.min).toBe(1);
    expect(s.q25).toBe(1.75);
    expect(s.median).toBe(2.5);
    expect(s.q75).toBe(3.25);
    expect(s.max).toBe(4);
  });

  it("should summarize an empty series with nulls", () => {
    expect(summarize([])).toEqual({
      count: 0,
      mean: null,
      std: null,
      min: null,
      q25: null,
      median: null,
      q75: null,
      max: null,
    });
  });
});

/* SHAPES
/*----------------------------------------------------- */

describe("histogram", () => {
  it("should bin values with the maximum in the last bin", () => {
    const h = computeHistogram([0, 1, 2, 3], 2);
    expect(h).toEqual({ min: 0, max: 3, edges: [0, 1.5, 3], counts: [2, 2], total: 4 });
  });

  it("should put a value on an interior edge in the upper bin", () => {
    expect(computeHistogram([0, 1, 2], 2)?.counts).toEqual([1, 2]);
  });

  it("should return null for no values", () => {
    expect(computeHistogram([], 4)).toBeNull();
  });

  it("should choose more bins for more rows", () => {
    expect(chooseBins(10)).toBe(8);
    expect(chooseBins(100)).toBe(10);
    expect(chooseBins(500)).toBe(12);
    expect(chooseBins(5000)).toBe(14);
  });
});

describe("kernelDensity", () => {
  it("should be symmetric for a symmetric sample", () => {
    const d = kernelDensity([0, 1, 2], 3);
    expect(d).not.toBeNull();
    if (!d) return;

    expect(d.map((p) => p.x)).toEqual([0, 1, 2]);
    expect(d[0].density).toBeCloseTo(d[2].density, 12);
    expect(d[1].density).toBeGreaterThan(d[0].density);
  });

  it("should give up on constant or single-value samples", () => {
    expect(kernelDensity([3, 3, 3], 10)).toBeNull();
    expect(kernelDensity([3], 10)).toBeNull();
  });
});

describe("computeBox", () => {
  it("should compute quartiles and whiskers", () => {
    expect(computeBox([1, 2, 3, 4, 5])).toEqual({
      min: 1,
      q1: 2,
      median: 3,
      q3: 4,
      max: 5,
      iqr: 2,
      outliers: [],
      total: 5,
    });
  });

  it("should pull whiskers in and report outliers", () => {
    const b = computeBox(sortAscending([100, 3, -50, 1, 4, 2]));
    expect(b?.outliers).toEqual([-50, 100]);
    expect(b?.min).toBe(1);
    expect(b?.max).toBe(4);
    expect(b?.total).toBe(6);
  });

  it("should return null for no values", () => {
    expect(computeBox([])).toBeNull();
  });
});

describe("pearson", () => {
  it("should be 1 for a perfect positive line", () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it("should be -1 for a perfect negative line", () => {
    expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 12);
  });

  it("should be null when a series is constant", () => {
    expect(pearson([1, 2, 3], [5, 5, 5])).toBeNull();
  });
});
