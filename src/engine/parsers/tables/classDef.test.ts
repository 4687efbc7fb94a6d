import { describe, expect, it } from "vitest";
import { classDef1, classDef2, readerFor } from "../../testing/layoutFixtures";
import { classIndexOf, classOf, loadClassDefinitionTable } from "./classDef";

describe("class definition tables", () => {
  it("loads format 1", () => {
    const table = loadClassDefinitionTable(readerFor(classDef1(10, [1, 2, 0, 3])), 0);

    expect(table).toEqual({ format: 1, startGlyphId: 10, classValues: [1, 2, 0, 3] });
    expect(classOf(table, 10)).toBe(1);
    expect(classOf(table, 13)).toBe(3);
  });

  it("loads format 2", () => {
    const table = loadClassDefinitionTable(
      readerFor(
        classDef2([
          [5, 9, 2],
          [20, 25, 4],
        ])
      ),
      0
    );

    expect(classOf(table, 5)).toBe(2);
    expect(classOf(table, 9)).toBe(2);
    expect(classOf(table, 22)).toBe(4);
  });

  it("puts unlisted glyphs in class 0", () => {
    const f1 = loadClassDefinitionTable(readerFor(classDef1(10, [1, 2])), 0);
    const f2 = loadClassDefinitionTable(readerFor(classDef2([[5, 9, 2]])), 0);

    expect(classIndexOf(f1, 9)).toBe(-1);
    expect(classIndexOf(f1, 12)).toBe(-1);
    expect(classOf(f1, 9)).toBe(0);
    expect(classOf(f1, 12)).toBe(0);
    expect(classIndexOf(f2, 4)).toBe(-1);
    expect(classOf(f2, 10)).toBe(0);
    expect(classOf(undefined, 10)).toBe(0);
  });

  it("rejects unknown formats", () => {
    expect(() => loadClassDefinitionTable(readerFor([0, 9]), 0)).toThrow(
      "Invalid value for 'classFormat' 9. Should be '1' or '2'."
    );
  });
});
