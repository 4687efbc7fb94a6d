import { describe, expect, it } from "vitest";
import { featureList, langSys, readerFor, scriptList, scriptTable } from "../../testing/layoutFixtures";
import { InvalidFontFileError } from "../FontErrors";
import { loadFeatureList } from "./featureList";
import { loadScriptList, resolveFeatures, selectLangSys } from "./scriptList";

const features = loadFeatureList(
  readerFor(
    featureList([
      ["kern", [2]],
      ["liga", [0]],
      ["locl", [1]],
      ["rlig", [3]],
    ])
  ),
  0
);

const scripts = loadScriptList(
  readerFor(
    scriptList([
      ["DFLT", scriptTable(langSys([0, 1]))],
      ["arab", scriptTable(langSys([0], 3), [["URD ", langSys([2, 0])]])],
      ["latn", scriptTable(langSys([1]), [["TRK ", langSys([0, 1, 2])]])],
    ])
  ),
  0
);

describe("script list", () => {
  it("loads scripts and their language systems", () => {
    expect([...scripts.scripts.keys()]).toEqual(["DFLT", "arab", "latn"]);
    const arab = scripts.scripts.get("arab");
    expect(arab?.defaultLangSys).toEqual({ requiredFeatureIndex: 3, featureIndices: [0] });
    expect(arab?.langSys.get("URD ")).toEqual({ requiredFeatureIndex: null, featureIndices: [2, 0] });
  });

  it("selects the language, then the script default", () => {
    expect(selectLangSys(scripts, "latn", "TRK")?.featureIndices).toEqual([0, 1, 2]);
    expect(selectLangSys(scripts, "latn", "DEU")?.featureIndices).toEqual([1]);
  });

  it("falls back to DFLT for scripts the font does not list", () => {
    expect(selectLangSys(scripts, "cyrl", "dflt")?.featureIndices).toEqual([0, 1]);
  });

  it("resolves features with the required feature first", () => {
    expect(resolveFeatures(scripts, features, "arab", "dflt")).toEqual([
      { featureTag: "rlig", lookupIndices: [3], required: true },
      { featureTag: "kern", lookupIndices: [2], required: false },
    ]);
    expect(resolveFeatures(scripts, features, "arab", "URD").map((f) => f.featureTag)).toEqual([
      "locl",
      "kern",
    ]);
  });

  it("returns nothing when no script applies", () => {
    const onlyCyrillic = loadScriptList(readerFor(scriptList([["cyrl", scriptTable(langSys([0]))]])), 0);
    expect(resolveFeatures(onlyCyrillic, features, "grek", "dflt")).toEqual([]);
  });

  it("rejects feature indices outside the FeatureList", () => {
    const bad = loadScriptList(readerFor(scriptList([["DFLT", scriptTable(langSys([9]))]])), 0);
    expect(() => resolveFeatures(bad, features, "DFLT", "dflt")).toThrow(InvalidFontFileError);
  });
});
