import { describe, expect, it } from "vitest";
import { coverage1, coverage2, readerFor } from "../../testing/layoutFixtures";
import { InvalidFontFileError, MalformedFontError } from "../FontErrors";
import { coverageIndexOf, loadCoverageTable } from "./coverage";

describe("coverage tables", () => {
  it("loads format 1 and finds dense indices", () => {
    const table = loadCoverageTable(readerFor(coverage1([3, 8, 20, 41])), 0);

    expect(table).toEqual({ format: 1, glyphArray: [3, 8, 20, 41] });
    expect([3, 8, 20, 41].map((g) => coverageIndexOf(table, g))).toEqual([0, 1, 2, 3]);
    expect(coverageIndexOf(table, 9)).toBe(-1);
    expect(coverageIndexOf(table, 0)).toBe(-1);
  });

  it("loads format 2 and computes indices inside ranges", () => {
    const table = loadCoverageTable(
      readerFor(
        coverage2([
          [10, 14, 0],
          [30, 31, 5],
        ])
      ),
      0
    );

    expect(coverageIndexOf(table, 10)).toBe(0);
    expect(coverageIndexOf(table, 14)).toBe(4);
    expect(coverageIndexOf(table, 30)).toBe(5);
    expect(coverageIndexOf(table, 31)).toBe(6);
    expect(coverageIndexOf(table, 15)).toBe(-1);
    expect(coverageIndexOf(table, 32)).toBe(-1);
  });

  it("gives strictly increasing indices to increasing covered glyphs", () => {
    const table = loadCoverageTable(
      readerFor(
        coverage2([
          [5, 9, 0],
          [100, 104, 5],
          [200, 200, 10],
        ])
      ),
      0
    );
    const glyphs = [5, 6, 7, 8, 9, 100, 101, 102, 103, 104, 200];
    const indices = glyphs.map((g) => coverageIndexOf(table, g));

    expect(indices).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("reads at a base offset", () => {
    const table = loadCoverageTable(readerFor([0xaa, 0xbb, ...coverage1([7])]), 2);
    expect(coverageIndexOf(table, 7)).toBe(0);
  });

  it("rejects unknown formats", () => {
    expect(() => loadCoverageTable(readerFor([0, 3, 0, 0]), 0)).toThrow(
      "Invalid value for 'coverageFormat' 3. Should be '1' or '2'."
    );
    expect(() => loadCoverageTable(readerFor([0, 3, 0, 0]), 0)).toThrow(InvalidFontFileError);
  });

  it("fails when the glyph count overflows the blob", () => {
    expect(() => loadCoverageTable(readerFor([0, 1, 0, 50, 0, 1]), 0)).toThrow(MalformedFontError);
  });
});
