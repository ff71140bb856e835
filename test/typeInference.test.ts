import { describe, expect, it } from "vitest";
import { UnknownColumnError } from "@/app/lib/errors";
import { Table, numericColumn, stringColumn } from "@/app/lib/table";
import { classify, classifyColumn, columnsOfType } from "@/app/lib/typeInference";

describe("classify", () => {
  it("should follow storage type, not value patterns", () => {
    expect(classify(stringColumn("zip", ["10001", "94105"]))).toBe("categorical");
    expect(classify(numericColumn("n", [1, 2]))).toBe("numerical");
    expect(classify(numericColumn("f", [1.5, 2], "float"))).toBe("numerical");
  });

  it("should classify all-missing columns by their storage type", () => {
    expect(classify(stringColumn("s", [null, null]))).toBe("categorical");
    expect(classify(numericColumn("f", [null, null], "float"))).toBe("numerical");
  });

  it("should not fail on empty columns", () => {
    expect(classify(stringColumn("s", []))).toBe("categorical");
    expect(classify(numericColumn("f", [], "float"))).toBe("numerical");
  });

  it("should be stable across repeated calls", () => {
    const col = stringColumn("c", ["a", null, "b"]);
    const first = classify(col);
    for (let i = 0; i < 5; i++) expect(classify(col)).toBe(first);
  });
});

describe("classifyColumn", () => {
  const table = new Table([
    numericColumn("age", [25, null, 35]),
    stringColumn("city", ["NY", "NY", "LA"]),
    numericColumn("empty", [null, null, null], "float"),
  ]);

  it("should classify by name and by index", () => {
    expect(classifyColumn(table, "city")).toBe("categorical");
    expect(classifyColumn(table, 0)).toBe("numerical");
  });

  it("should classify an all-missing column without throwing", () => {
    expect(classifyColumn(table, "empty")).toBe("numerical");
  });

  it("should throw UnknownColumnError for an unknown column", () => {
    expect(() => classifyColumn(table, "country")).toThrow(UnknownColumnError);
    expect(() => classifyColumn(table, 7)).toThrow(UnknownColumnError);
  });

  it("should list columns of one type in declaration order", () => {
    expect(columnsOfType(table, "numerical")).toEqual(["age", "empty"]);
    expect(columnsOfType(table, "categorical")).toEqual(["city"]);
  });
});
