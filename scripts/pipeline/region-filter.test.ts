import { describe, expect, it } from "vitest";
import { matchesRegion, regionFilter, resolveRegions } from "./region-filter";

describe("region filter", () => {
  it("expands aliases case-insensitively and keeps unknown names", () => {
    expect(resolveRegions(["eu", "JPN", " USA ", ""])).toEqual(["Europe", "Japan", "USA"]);
  });

  it("matches against the first parenthesised group only", () => {
    expect(matchesRegion("Game (USA, Europe) (Rev 1).zip", ["europe"])).toBe(true);
    expect(matchesRegion("Game (Japan) (Europe Promo).zip", ["Europe"])).toBe(false);
    expect(matchesRegion("Game.zip", ["USA"])).toBe(false);
  });

  it("uses the file name of a relative path and passes everything when no regions are set", () => {
    expect(regionFilter(["Japan"])("Nintendo (USA)/Game (Japan).zip")).toBe(true);
    expect(regionFilter(["Japan"])("Nintendo (Japan)/Game (USA).zip")).toBe(false);
    expect(regionFilter([])("anything.bin")).toBe(true);
  });
});
