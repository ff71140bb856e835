import { describe, expect, it } from "vitest";
import { UnknownColumnError, ZeroVarianceError } from "@/app/lib/errors";
import { scale } from "@/app/lib/scale";
import { Table, numericColumn } from "@/app/lib/table";

describe("scale", () => {
  it("should standardize with the sample standard deviation", () => {
    const { table, issues } = scale(new Table([numericColumn("x", [1, 2, 3])]), ["x"]);

    expect(issues).toEqual([]);
    expect(table.values("x")).toEqual([-1, 0, 1]);
    expect(table.column("x").storage).toBe("float");
  });

  it("should leave unlisted columns alone", () => {
    const { table } = scale(new Table([numericColumn("x", [1, 2, 3]), numericColumn("y", [4, 5, 9])]), ["x"]);
    expect(table.values("y")).toEqual([4, 5, 9]);
  });

  it("should never scale indicator columns", () => {
    const flag = numericColumn("c_a", [1, 0, 1], "integer", { source: "c", category: "a" });
    const { table, issues } = scale(new Table([flag]), ["c_a"]);

    expect(issues).toEqual([]);
    expect(table.values("c_a")).toEqual([1, 0, 1]);
  });

  it("should report a constant column and pass it through", () => {
    const { table, issues } = scale(new Table([numericColumn("k", [5, 5, 5])]), ["k"]);

    expect(issues).toHaveLength(1);
    expect(issues[0]).toBeInstanceOf(ZeroVarianceError);
    expect(issues[0].column).toBe("k");
    expect(table.values("k")).toEqual([5, 5, 5]);
  });

  it("should report a single-row column, whose deviation is undefined", () => {
    const { issues } = scale(new Table([numericColumn("k", [3])]), ["k"]);
    expect(issues.map((i) => i.code)).toEqual(["ZERO_VARIANCE"]);
  });

  it("should keep missing cells missing", () => {
    const { table } = scale(new Table([numericColumn("x", [1, null, 3])]), ["x"]);
    const values = table.values("x");

    expect(values[1]).toBeNull();
    expect(values[0]).toBeCloseTo(-Math.SQRT1_2, 12);
    expect(values[2]).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it("should reject an unknown column name", () => {
    expect(() => scale(new Table([numericColumn("x", [1, 2])]), ["nope"])).toThrow(UnknownColumnError);
  });
});
