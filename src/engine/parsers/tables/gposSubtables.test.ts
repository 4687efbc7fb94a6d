import { describe, expect, it } from "vitest";
import { i16, u16 } from "../../testing/BinaryWriter";
import {
  classDef2,
  coverage1,
  cursivePos,
  extension,
  markAttachPos,
  markLigPos,
  pairPos1,
  pairPos2,
  readerFor,
  singlePos1,
} from "../../testing/layoutFixtures";
import { loadAnchor, loadGPosSubTable, readValueRecord, ValueFormat } from "./gposSubtables";

describe("GPOS value records and anchors", () => {
  it("reads value record fields in flag order and skips device offsets", () => {
    const format = ValueFormat.X_PLACEMENT | ValueFormat.X_ADVANCE | ValueFormat.X_ADVANCE_DEVICE;
    const reader = readerFor([...i16(-5, 30), ...u16(0x40, 0xbeef)]);

    expect(readValueRecord(reader, format)).toEqual({ xPlacement: -5, yPlacement: 0, xAdvance: 30, yAdvance: 0 });
    expect(reader.readUInt16()).toBe(0xbeef);
  });

  it("loads anchor formats 1 to 3", () => {
    expect(loadAnchor(readerFor([...u16(1), ...i16(10, -20)]), 0)).toEqual({ x: 10, y: -20 });
    expect(loadAnchor(readerFor([...u16(2), ...i16(10, -20), ...u16(4)]), 0)).toEqual({ x: 10, y: -20 });
    expect(loadAnchor(readerFor([...u16(3), ...i16(10, -20), ...u16(0, 0)]), 0)).toEqual({ x: 10, y: -20 });
    expect(() => loadAnchor(readerFor(u16(4, 0, 0)), 0)).toThrow(
      "Invalid value for 'anchorFormat' 4. Should be '1', '2' or '3'."
    );
  });
});

describe("GPOS subtables", () => {
  it("loads single adjustment", () => {
    const { subtable } = loadGPosSubTable(readerFor(singlePos1([7], ValueFormat.Y_PLACEMENT, [15])), 1, 0);
    expect(subtable).toEqual({
      kind: "single",
      format: 1,
      coverage: { format: 1, glyphArray: [7] },
      value: { xPlacement: 0, yPlacement: 15, xAdvance: 0, yAdvance: 0 },
    });
  });

  it("loads pair adjustment format 1", () => {
    const { subtable } = loadGPosSubTable(
      readerFor(
        pairPos1(ValueFormat.X_ADVANCE, 0, [
          [
            10,
            [
              [11, [-40], []],
              [12, [-25], []],
            ],
          ],
        ])
      ),
      2,
      0
    );
    expect(subtable).toEqual({
      kind: "pair",
      format: 1,
      coverage: { format: 1, glyphArray: [10] },
      valueFormat2: 0,
      pairSets: [
        [
          { secondGlyph: 11, value1: { xPlacement: 0, yPlacement: 0, xAdvance: -40, yAdvance: 0 }, value2: { xPlacement: 0, yPlacement: 0, xAdvance: 0, yAdvance: 0 } },
          { secondGlyph: 12, value1: { xPlacement: 0, yPlacement: 0, xAdvance: -25, yAdvance: 0 }, value2: { xPlacement: 0, yPlacement: 0, xAdvance: 0, yAdvance: 0 } },
        ],
      ],
    });
  });

  it("loads pair adjustment format 2 class records", () => {
    const { subtable } = loadGPosSubTable(
      readerFor(
        pairPos2({
          coverage: coverage1([10]),
          valueFormat1: ValueFormat.X_ADVANCE,
          valueFormat2: ValueFormat.X_PLACEMENT,
          classDef1: classDef2([[10, 10, 1]]),
          classDef2: classDef2([[20, 21, 1]]),
          values: [
            [
              [0, 0],
              [0, 0],
            ],
            [
              [0, 0],
              [-30, 5],
            ],
          ],
        })
      ),
      2,
      0
    );
    if (subtable.kind !== "pair" || subtable.format !== 2) throw new Error("expected pair format 2");
    expect(subtable.valueFormat2).toBe(ValueFormat.X_PLACEMENT);
    expect(subtable.classRecords[1][1]).toEqual({
      value1: { xPlacement: 0, yPlacement: 0, xAdvance: -30, yAdvance: 0 },
      value2: { xPlacement: 5, yPlacement: 0, xAdvance: 0, yAdvance: 0 },
    });
  });

  it("loads cursive entry and exit anchors, keeping NULL ones as null", () => {
    const { subtable } = loadGPosSubTable(
      readerFor(
        cursivePos([
          [1, null, [500, 100]],
          [2, [50, 20], null],
        ])
      ),
      3,
      0
    );
    expect(subtable).toEqual({
      kind: "cursive",
      coverage: { format: 1, glyphArray: [1, 2] },
      entryExitRecords: [
        { entry: null, exit: { x: 500, y: 100 } },
        { entry: { x: 50, y: 20 }, exit: null },
      ],
    });
  });

  it("loads mark-to-base attachment", () => {
    const { subtable } = loadGPosSubTable(
      readerFor(
        markAttachPos({
          marks: [[30, 0, [100, 500]]],
          bases: [[10, [[300, 700]]]],
          markClassCount: 1,
        })
      ),
      4,
      0
    );
    expect(subtable).toEqual({
      kind: "markToBase",
      markCoverage: { format: 1, glyphArray: [30] },
      baseCoverage: { format: 1, glyphArray: [10] },
      marks: [{ markClass: 0, anchor: { x: 100, y: 500 } }],
      baseAnchors: [[{ x: 300, y: 700 }]],
    });
  });

  it("loads mark-to-ligature anchors per component", () => {
    const { subtable } = loadGPosSubTable(
      readerFor(
        markLigPos({
          marks: [[30, 0, [0, 0]]],
          ligatures: [[90, [[[100, 600]], [null], [[700, 600]]]]],
          markClassCount: 1,
        })
      ),
      5,
      0
    );
    if (subtable.kind !== "markToLigature") throw new Error("expected mark-to-ligature");
    expect(subtable.ligatureAnchors).toEqual([[[{ x: 100, y: 600 }], [null], [{ x: 700, y: 600 }]]]);
  });

  it("unwraps extension positioning", () => {
    const loaded = loadGPosSubTable(readerFor(extension(2, pairPos1(ValueFormat.X_ADVANCE, 0, [[10, [[11, [-40], []]]]]))), 9, 0);
    expect(loaded.lookupType).toBe(2);
    expect(loaded.subtable.kind).toBe("pair");
  });

  it("rejects unknown formats and lookup types", () => {
    expect(() => loadGPosSubTable(readerFor(u16(3)), 2, 0)).toThrow(
      "Invalid value for 'posFormat' 3. Should be '1' or '2'."
    );
    expect(() => loadGPosSubTable(readerFor(u16(2)), 4, 0)).toThrow("Invalid value for 'posFormat' 2. Should be '1'.");
    expect(() => loadGPosSubTable(readerFor(u16(1)), 10, 0)).toThrow(
      "Invalid value for 'lookupType' 10. Should be '1', '2', '3', '4', '5', '6', '7', '8' or '9'."
    );
  });
});
