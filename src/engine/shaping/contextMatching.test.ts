import { describe, expect, it } from "vitest";
import { GlyphClass } from "../parsers/tables/gdef";
import { LookupFlag } from "../parsers/tables/lookupList";
import {
  chainContext1,
  chainContext2,
  chainContext3,
  classDef2,
  context1,
  context2,
  context3,
  coverage1,
  glyphArraysSubst,
  lookup,
  singleSubst1,
} from "../testing/layoutFixtures";
import { feature, gdefWithClasses, glyphBuffer, gsubLookups } from "../testing/shapingFixtures";
import { SubstitutionProcessor } from "./LookupProcessor";

// Backtrack 1, input [20, 21], lookahead 2; lookup 1 bumps the second input glyph 21 -> 121.
const nested = lookup(1, 0, [singleSubst1([21], 100)]);

const chainedFormats = {
  "format 1": chainContext1([[20, [{ backtrack: [1], input: [21], lookahead: [2], records: [[1, 1]] }]]]),
  "format 2": chainContext2({
    coverage: coverage1([20]),
    backtrackClassDef: classDef2([[1, 1, 1]]),
    inputClassDef: classDef2([
      [20, 20, 1],
      [21, 21, 2],
    ]),
    lookaheadClassDef: classDef2([[2, 2, 1]]),
    classSets: [[], [{ backtrack: [1], input: [2], lookahead: [1], records: [[1, 1]] }], []],
  }),
  "format 3": chainContext3({ backtrack: [[1]], input: [[20], [21]], lookahead: [[2]], records: [[1, 1]] }),
};

function shape(subtable: number[], glyphs: number[], flag = 0, gdefGlyphs?: Array<[number, number, number]>) {
  const buffer = glyphBuffer(glyphs, ["calt"]);
  const gdef = gdefGlyphs ? gdefWithClasses(gdefGlyphs) : undefined;
  new SubstitutionProcessor(gsubLookups(lookup(6, flag, [subtable]), nested), gdef).applyFeatures(buffer, [
    feature("calt", [0]),
  ]);
  return buffer.glyphIds();
}

describe("chained context matching", () => {
  const cases: Array<[glyphs: number[], expected: number[]]> = [
    [
      [1, 20, 21, 2],
      [1, 20, 121, 2],
    ],
    [
      [5, 20, 21, 2],
      [5, 20, 21, 2],
    ],
    [
      [1, 20, 21, 3],
      [1, 20, 21, 3],
    ],
    [
      [20, 21, 2],
      [20, 21, 2],
    ],
    [
      [1, 20, 21],
      [1, 20, 21],
    ],
    [
      [1, 20, 0, 21, 2],
      [1, 20, 0, 21, 2],
    ],
    [
      [9, 1, 20, 21, 2, 1, 20, 21, 2],
      [9, 1, 20, 121, 2, 1, 20, 121, 2],
    ],
  ];

  for (const [name, subtable] of Object.entries(chainedFormats)) {
    it(`${name} applies only where backtrack, input and lookahead all match`, () => {
      for (const [glyphs, expected] of cases) {
        expect(shape(subtable, glyphs)).toEqual(expected);
      }
    });

    it(`${name} steps over marks the lookup ignores`, () => {
      const gdef: Array<[number, number, number]> = [[30, 30, GlyphClass.MARK]];
      expect(shape(subtable, [1, 30, 20, 30, 21, 30, 2], LookupFlag.IGNORE_MARKS, gdef)).toEqual([
        1, 30, 20, 30, 121, 30, 2,
      ]);
    });
  }

  it("formats 1, 2 and 3 give the same result on every case", () => {
    for (const [glyphs] of cases) {
      const results = Object.values(chainedFormats).map((subtable) => shape(subtable, glyphs));
      expect(results[1]).toEqual(results[0]);
      expect(results[2]).toEqual(results[0]);
    }
  });
});

const contextFormats = {
  "format 1": context1([[20, [{ input: [21], records: [[1, 1]] }]]]),
  "format 2": context2({
    coverage: coverage1([20]),
    classDef: classDef2([
      [20, 20, 1],
      [21, 21, 2],
    ]),
    classSets: [[], [{ input: [2], records: [[1, 1]] }], []],
  }),
  "format 3": context3([[20], [21]], [[1, 1]]),
};

function shapeContext(subtable: number[], glyphs: number[]) {
  const buffer = glyphBuffer(glyphs, ["calt"]);
  new SubstitutionProcessor(gsubLookups(lookup(5, 0, [subtable]), nested)).applyFeatures(buffer, [
    feature("calt", [0]),
  ]);
  return buffer.glyphIds();
}

describe("non-chained context", () => {
  for (const [name, subtable] of Object.entries(contextFormats)) {
    it(`${name} applies where the input sequence matches`, () => {
      expect(shapeContext(subtable, [5, 20, 21, 20, 22])).toEqual([5, 20, 121, 20, 22]);
      expect(shapeContext(subtable, [20, 0, 21])).toEqual([20, 0, 21]);
      expect(shapeContext(subtable, [21, 20])).toEqual([21, 20]);
    });
  }

  it("format 1 tries the rules of a set in order", () => {
    const subtable = context1([
      [
        20,
        [
          { input: [21, 22], records: [[0, 1]] },
          { input: [21], records: [[1, 1]] },
        ],
      ],
    ]);
    expect(shapeContext(subtable, [20, 21, 23])).toEqual([20, 121, 23]);
  });

  it("format 2 classifies every input glyph with its one ClassDef", () => {
    const subtable = context2({
      coverage: coverage1([20, 22]),
      classDef: classDef2([
        [20, 20, 1],
        [21, 21, 2],
        [22, 22, 1],
      ]),
      classSets: [[], [{ input: [1, 2], records: [[2, 1]] }], []],
    });
    expect(shapeContext(subtable, [22, 20, 21])).toEqual([22, 20, 121]);
    expect(shapeContext(subtable, [22, 21, 21])).toEqual([22, 21, 21]);
  });

  it("applies nested lookups at the recorded input positions", () => {
    const buffer = glyphBuffer([20, 21, 20, 21], ["calt"]);
    new SubstitutionProcessor(
      gsubLookups(lookup(5, 0, [context3([[20], [21]], [[1, 1]])]), nested)
    ).applyFeatures(buffer, [feature("calt", [0])]);
    expect(buffer.glyphIds()).toEqual([20, 121, 20, 121]);
  });

  it("applies every lookup record in order and follows length changes", () => {
    // Record 0 expands 20 into [40, 41]; record 1 then hits 21 at its moved position.
    const expand = lookup(2, 0, [glyphArraysSubst([20], [[40, 41]])]);
    const buffer = glyphBuffer([20, 21, 7], ["calt"]);
    new SubstitutionProcessor(
      gsubLookups(
        lookup(5, 0, [
          context3(
            [[20], [21]],
            [
              [0, 2],
              [1, 1],
            ]
          ),
        ]),
        nested,
        expand
      )
    ).applyFeatures(buffer, [feature("calt", [0])]);
    expect(buffer.glyphIds()).toEqual([40, 41, 121, 7]);
  });

  it("leaves the buffer alone when the nested lookups change nothing", () => {
    const buffer = glyphBuffer([20, 21], ["calt"]);
    new SubstitutionProcessor(
      gsubLookups(lookup(5, 0, [context3([[20], [21]], [[0, 1]])]), nested)
    ).applyFeatures(buffer, [feature("calt", [0])]);
    expect(buffer.glyphIds()).toEqual([20, 21]);
  });
});
