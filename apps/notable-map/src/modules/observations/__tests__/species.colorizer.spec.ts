import { hslToHex, SpeciesColorizer } from "../species.colorizer";

describe("SpeciesColorizer", () => {
  const colorizer = new SpeciesColorizer();

  it("maps species names to fixed colors", () => {
    expect(colorizer.colorFor("Blue Jay")).toBe("#a0c322");
    expect(colorizer.colorFor("Snowy Owl")).toBe("#c36222");
    expect(colorizer.colorFor("Common Loon")).toBe("#c32255");
    expect(colorizer.colorFor("Mallard")).toBe("#22c3b5");
  });

  it("is stable across calls and instances", () => {
    const other = new SpeciesColorizer();

    expect(colorizer.colorFor("Blue Jay")).toBe(colorizer.colorFor("Blue Jay"));
    expect(other.colorFor("Blue Jay")).toBe(colorizer.colorFor("Blue Jay"));
  });

  it("colors missing names like Unknown", () => {
    expect(colorizer.colorFor("Unknown")).toBe("#c33222");
    expect(colorizer.colorFor(undefined)).toBe("#c33222");
    expect(colorizer.colorFor(null)).toBe("#c33222");
    expect(colorizer.colorFor("")).toBe("#c33222");
  });

  it("builds a legend table sorted by species name", () => {
    const table = colorizer.buildColorTable([
      "Snowy Owl",
      "Blue Jay",
      "Mallard",
      "Blue Jay",
    ]);

    expect([...table.entries()]).toEqual([
      ["Blue Jay", "#a0c322"],
      ["Mallard", "#22c3b5"],
      ["Snowy Owl", "#c36222"],
    ]);
  });

  describe("hslToHex", () => {
    it("converts the primary hues", () => {
      expect(hslToHex(0, 1, 0.5)).toBe("#ff0000");
      expect(hslToHex(120, 1, 0.5)).toBe("#00ff00");
      expect(hslToHex(0, 0.7, 0.45)).toBe("#c32222");
      expect(hslToHex(240, 0.7, 0.45)).toBe("#2222c3");
    });
  });
});
