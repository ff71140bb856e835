import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, paletteColor, resolveConfig } from "@/app/lib/config";

describe("resolveConfig", () => {
  it("should return the defaults when nothing is set", () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it("should read the column policy and debug flag from the environment", () => {
    const config = resolveConfig({}, { CHARTPREP_COLUMN_POLICY: "skip", CHARTPREP_DEBUG: "1" });
    expect(config.columnPolicy).toBe("skip");
    expect(config.debug).toBe(true);
  });

  it("should ignore unrecognised environment values", () => {
    const config = resolveConfig({}, { CHARTPREP_COLUMN_POLICY: "maybe", CHARTPREP_DEBUG: "loud" });
    expect(config.columnPolicy).toBe("fail");
    expect(config.debug).toBe(false);
  });

  it("should let explicit overrides win over the environment", () => {
    const config = resolveConfig({ columnPolicy: "fail" }, { CHARTPREP_COLUMN_POLICY: "skip" });
    expect(config.columnPolicy).toBe("fail");
  });

  it("should skip overrides left undefined", () => {
    const config = resolveConfig({ columnPolicy: undefined }, { CHARTPREP_COLUMN_POLICY: "skip" });
    expect(config.columnPolicy).toBe("skip");
  });

  it("should reject an empty palette", () => {
    expect(() => resolveConfig({ groupPalette: [] }, {})).toThrow("palettes must contain at least one color");
  });
});

describe("paletteColor", () => {
  it("should cycle through the palette", () => {
    const palette = ["#a", "#b", "#c"];
    expect([0, 1, 2, 3, 4].map((i) => paletteColor(palette, i))).toEqual(["#a", "#b", "#c", "#a", "#b"]);
  });
});
