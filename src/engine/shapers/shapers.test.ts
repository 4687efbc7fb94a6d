import { describe, expect, it } from "vitest";
import { GlyphSubstitutionCollection } from "../collections/GlyphSubstitutionCollection";
import { parseShapingOptions, resolveFeatureSettings } from "../config/shapingOptions";
import { ArabicShaper, DEFAULT_FEATURES, DefaultShaper, joiningForms, joiningTypeOf, shaperForScript } from "./index";

const BEH = 0x0628;
const ALEF = 0x0627;
const FATHA = 0x064e;
const HAMZA = 0x0621;
const TATWEEL = 0x0640;

const settingsFor = (features: Record<string, boolean | number>) =>
  resolveFeatureSettings(parseShapingOptions({ features }));

const featuresOf = (collection: GlyphSubstitutionCollection, index: number) =>
  [...collection.featuresAt(index)].sort();

describe("shaperForScript", () => {
  it("picks the Arabic shaper for arab only", () => {
    expect(shaperForScript("arab").name).toBe("arabic");
    expect(shaperForScript("latn").name).toBe("default");
    expect(shaperForScript("DFLT")).toBeInstanceOf(DefaultShaper);
  });
});

describe("DefaultShaper", () => {
  it("applies request overrides to the default features", () => {
    const shaper = new DefaultShaper(settingsFor({ liga: false, smcp: true }));
    const expected = [...DEFAULT_FEATURES.filter((t) => t !== "liga"), "smcp"].sort();
    expect([...shaper.enabledFeatures].sort()).toEqual(expected);
  });

  it("tags only the requested range", () => {
    const collection = GlyphSubstitutionCollection.fromGlyphIds([1, 2, 3]);
    new DefaultShaper(settingsFor({})).assignFeatures(collection, 1, 1);
    expect(collection.featuresAt(0).size).toBe(0);
    expect(collection.featuresAt(1).size).toBe(DEFAULT_FEATURES.length);
    expect(collection.featuresAt(2).size).toBe(0);
  });
});

describe("Arabic joining", () => {
  it("looks up joining types", () => {
    expect(joiningTypeOf(BEH)).toBe("D");
    expect(joiningTypeOf(ALEF)).toBe("R");
    expect(joiningTypeOf(FATHA)).toBe("T");
    expect(joiningTypeOf(TATWEEL)).toBe("C");
    expect(joiningTypeOf(0x200d)).toBe("C");
    expect(joiningTypeOf(0x61)).toBe("U");
  });

  it("derives positional forms from neighbours", () => {
    expect(joiningForms(["D", "D", "D"])).toEqual(["init", "medi", "fina"]);
    expect(joiningForms(["R", "D"])).toEqual(["isol", "isol"]);
    expect(joiningForms(["D", "T", "R"])).toEqual(["init", undefined, "fina"]);
    expect(joiningForms(["D", "U", "D"])).toEqual(["isol", undefined, "isol"]);
    expect(joiningForms(["C", "D"])).toEqual(["init", "fina"]);
  });

  it("tags joining letters with their positional form only", () => {
    const collection = GlyphSubstitutionCollection.fromGlyphIds([1, 2, 3, 4], [BEH, FATHA, ALEF, HAMZA]);
    new ArabicShaper(settingsFor({})).assignFeatures(collection);

    const positional = (i: number) => featuresOf(collection, i).filter((t) => ["isol", "init", "medi", "fina"].includes(t));
    expect([0, 1, 2, 3].map(positional)).toEqual([["init"], [], ["fina"], []]);
    expect(collection.hasFeature(1, "mset")).toBe(true);
    expect(collection.hasFeature(1, "ccmp")).toBe(true);
  });

  it("leaves out a positional feature the request disabled", () => {
    const collection = GlyphSubstitutionCollection.fromGlyphIds([1, 2], [BEH, ALEF]);
    new ArabicShaper(settingsFor({ init: false })).assignFeatures(collection);
    expect(collection.hasFeature(0, "init")).toBe(false);
    expect(collection.hasFeature(1, "fina")).toBe(true);
  });
});
