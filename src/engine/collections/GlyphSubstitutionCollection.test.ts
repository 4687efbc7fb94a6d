import { describe, expect, it } from "vitest";
import { GlyphSubstitutionCollection } from "./GlyphSubstitutionCollection";

describe("GlyphSubstitutionCollection", () => {
  it("builds slots with clusters, code points and no features", () => {
    const c = GlyphSubstitutionCollection.fromGlyphIds([4, 5], [0x61, 0x62]);
    expect(c.length).toBe(2);
    expect(c.slotAt(1)).toMatchObject({ glyphId: 5, codePoint: 0x62, cluster: 1, componentCount: 1 });
    expect(c.featuresAt(0).size).toBe(0);
    expect(GlyphSubstitutionCollection.fromGlyphIds([9]).codePointAt(0)).toBe(-1);
  });

  it("replaces a range, copying the first replaced slot's data", () => {
    const c = GlyphSubstitutionCollection.fromGlyphIds([1, 2, 3]);
    c.addFeature(1, "ccmp");
    c.replaceRange(1, 1, [7, 8]);

    expect(c.glyphIds()).toEqual([1, 7, 8, 3]);
    expect(c.slotAt(2).cluster).toBe(1);
    expect(c.hasFeature(2, "ccmp")).toBe(true);

    c.removeFeature(2, "ccmp");
    expect(c.hasFeature(1, "ccmp")).toBe(true);
  });

  it("removes slots", () => {
    const c = GlyphSubstitutionCollection.fromGlyphIds([1, 2, 3]);
    c.removeAt(0);
    expect(c.glyphIds()).toEqual([2, 3]);
  });

  it("rejects out-of-range access", () => {
    const c = GlyphSubstitutionCollection.fromGlyphIds([1]);
    expect(() => c.glyphIdAt(1)).toThrow("Slot 1 is outside the collection (length 1)");
    expect(() => c.replaceRange(1, 1, [])).toThrow("Range [1, 2) is outside the collection (length 1)");
  });

  it("hands out a fresh id per ligature", () => {
    const c = GlyphSubstitutionCollection.fromGlyphIds([1, 2, 3]);
    expect(c.markLigature(0, 2)).toBe(1);
    expect(c.markLigature(2, 3)).toBe(2);
    c.setLigatureComponent(1, 1, 2);
    expect(c.slotAt(1)).toMatchObject({ ligatureId: 1, ligatureComponent: 2 });
    expect(c.slotAt(2)).toMatchObject({ ligatureId: 2, ligatureComponent: 0, componentCount: 3 });
  });
});
