/**
 * GPOS lookup subtable decoders, plus the ValueRecord and Anchor tables they share.
 * https://learn.microsoft.com/en-us/typography/opentype/spec/gpos
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { invalidFormat } from "../FontErrors";
import { type ClassDefinitionTable, loadClassDefinitionTable } from "./classDef";
import { type CoverageTable, loadCoverageTable } from "./coverage";
import type { LoadedSubTable } from "./lookupList";
import {
  loadChainedSequenceContext,
  loadSequenceContext,
  type SequenceContext,
} from "./sequenceContext";

// ValueFormat flags
export const ValueFormat = {
  X_PLACEMENT: 0x0001,
  Y_PLACEMENT: 0x0002,
  X_ADVANCE: 0x0004,
  Y_ADVANCE: 0x0008,
  X_PLACEMENT_DEVICE: 0x0010,
  Y_PLACEMENT_DEVICE: 0x0020,
  X_ADVANCE_DEVICE: 0x0040,
  Y_ADVANCE_DEVICE: 0x0080,
} as const;

export interface ValueRecord {
  xPlacement: number;
  yPlacement: number;
  xAdvance: number;
  yAdvance: number;
}

export interface Anchor {
  x: number;
  y: number;
}

export interface MarkRecord {
  markClass: number;
  anchor: Anchor;
}

export interface EntryExitRecord {
  entry: Anchor | null;
  exit: Anchor | null;
}

export interface PairValueRecord {
  secondGlyph: number;
  value1: ValueRecord;
  value2: ValueRecord;
}

export type GPosSubTable =
  | { kind: "single"; format: 1; coverage: CoverageTable; value: ValueRecord }
  | { kind: "single"; format: 2; coverage: CoverageTable; values: readonly ValueRecord[] }
  | {
      kind: "pair";
      format: 1;
      coverage: CoverageTable;
      valueFormat2: number;
      /** Indexed by coverage index, each sorted by secondGlyph */
      pairSets: readonly (readonly PairValueRecord[])[];
    }
  | {
      kind: "pair";
      format: 2;
      coverage: CoverageTable;
      valueFormat2: number;
      classDef1: ClassDefinitionTable;
      classDef2: ClassDefinitionTable;
      /** [class1][class2] */
      classRecords: readonly (readonly { value1: ValueRecord; value2: ValueRecord }[])[];
    }
  | { kind: "cursive"; coverage: CoverageTable; entryExitRecords: readonly EntryExitRecord[] }
  | {
      kind: "markToBase";
      markCoverage: CoverageTable;
      baseCoverage: CoverageTable;
      marks: readonly MarkRecord[];
      /** [base][markClass] */
      baseAnchors: readonly (readonly (Anchor | null)[])[];
    }
  | {
      kind: "markToLigature";
      markCoverage: CoverageTable;
      ligatureCoverage: CoverageTable;
      marks: readonly MarkRecord[];
      /** [ligature][component][markClass] */
      ligatureAnchors: readonly (readonly (readonly (Anchor | null)[])[])[];
    }
  | {
      kind: "markToMark";
      mark1Coverage: CoverageTable;
      mark2Coverage: CoverageTable;
      marks: readonly MarkRecord[];
      /** [mark2][markClass] */
      mark2Anchors: readonly (readonly (Anchor | null)[])[];
    }
  | { kind: "context"; context: SequenceContext }
  | { kind: "chainedContext"; context: SequenceContext };

export const EMPTY_VALUE: ValueRecord = { xPlacement: 0, yPlacement: 0, xAdvance: 0, yAdvance: 0 };

/**
 * Reads the fields `valueFormat` declares, in flag order. Device and
 * variation-index offsets are read past but not applied.
 */
export function readValueRecord(reader: BigEndianBinaryReader, valueFormat: number): ValueRecord {
  const value = { ...EMPTY_VALUE };
  if (valueFormat & ValueFormat.X_PLACEMENT) value.xPlacement = reader.readInt16();
  if (valueFormat & ValueFormat.Y_PLACEMENT) value.yPlacement = reader.readInt16();
  if (valueFormat & ValueFormat.X_ADVANCE) value.xAdvance = reader.readInt16();
  if (valueFormat & ValueFormat.Y_ADVANCE) value.yAdvance = reader.readInt16();
  if (valueFormat & ValueFormat.X_PLACEMENT_DEVICE) reader.readOffset16();
  if (valueFormat & ValueFormat.Y_PLACEMENT_DEVICE) reader.readOffset16();
  if (valueFormat & ValueFormat.X_ADVANCE_DEVICE) reader.readOffset16();
  if (valueFormat & ValueFormat.Y_ADVANCE_DEVICE) reader.readOffset16();
  return value;
}

export function loadAnchor(reader: BigEndianBinaryReader, offset: number): Anchor {
  reader.seek(offset);
  const anchorFormat = reader.readUInt16();
  if (anchorFormat < 1 || anchorFormat > 3) return invalidFormat("anchorFormat", anchorFormat, [1, 2, 3]);
  // Format 2 adds an anchor point index, format 3 two device offsets; only x/y are used.
  const x = reader.readInt16();
  const y = reader.readInt16();
  return { x, y };
}

function loadOptionalAnchor(reader: BigEndianBinaryReader, base: number, offset: number): Anchor | null {
  return offset === 0 ? null : loadAnchor(reader, base + offset);
}

function loadMarkArray(reader: BigEndianBinaryReader, offset: number): MarkRecord[] {
  reader.seek(offset);
  const markCount = reader.readUInt16();
  const raw = reader.readUInt16Array(markCount * 2);
  const out: MarkRecord[] = [];
  for (let i = 0; i < markCount; i++) {
    out.push({ markClass: raw[i * 2], anchor: loadAnchor(reader, offset + raw[i * 2 + 1]) });
  }
  return out;
}

/**
 * BaseArray / Mark2Array: uint16 count, then `count` records of
 * `markClassCount` anchor offsets from the array start.
 */
function loadAnchorMatrix(
  reader: BigEndianBinaryReader,
  offset: number,
  markClassCount: number
): (Anchor | null)[][] {
  reader.seek(offset);
  const count = reader.readUInt16();
  const raw = reader.readOffset16Array(count * markClassCount);
  const out: (Anchor | null)[][] = [];
  for (let i = 0; i < count; i++) {
    const row: (Anchor | null)[] = [];
    for (let c = 0; c < markClassCount; c++) {
      row.push(loadOptionalAnchor(reader, offset, raw[i * markClassCount + c]));
    }
    out.push(row);
  }
  return out;
}

function readFormat(reader: BigEndianBinaryReader, offset: number): number {
  reader.seek(offset);
  return reader.readUInt16();
}

function loadSingleAdjustment(reader: BigEndianBinaryReader, offset: number): GPosSubTable {
  const posFormat = readFormat(reader, offset);
  switch (posFormat) {
    case 1: {
      const coverageOffset = reader.readOffset16();
      const valueFormat = reader.readUInt16();
      const value = readValueRecord(reader, valueFormat);
      return {
        kind: "single",
        format: 1,
        coverage: loadCoverageTable(reader, offset + coverageOffset),
        value,
      };
    }
    case 2: {
      const coverageOffset = reader.readOffset16();
      const valueFormat = reader.readUInt16();
      const valueCount = reader.readUInt16();
      const values: ValueRecord[] = [];
      for (let i = 0; i < valueCount; i++) values.push(readValueRecord(reader, valueFormat));
      return {
        kind: "single",
        format: 2,
        coverage: loadCoverageTable(reader, offset + coverageOffset),
        values,
      };
    }
    default:
      return invalidFormat("posFormat", posFormat, [1, 2]);
  }
}

function loadPairAdjustment(reader: BigEndianBinaryReader, offset: number): GPosSubTable {
  const posFormat = readFormat(reader, offset);
  switch (posFormat) {
    case 1: {
      const coverageOffset = reader.readOffset16();
      const valueFormat1 = reader.readUInt16();
      const valueFormat2 = reader.readUInt16();
      const pairSetCount = reader.readUInt16();
      const pairSetOffsets = reader.readOffset16Array(pairSetCount);
      const pairSets = pairSetOffsets.map((setOffset) => {
        reader.seek(offset + setOffset);
        const pairValueCount = reader.readUInt16();
        const records: PairValueRecord[] = [];
        for (let i = 0; i < pairValueCount; i++) {
          const secondGlyph = reader.readUInt16();
          const value1 = readValueRecord(reader, valueFormat1);
          const value2 = readValueRecord(reader, valueFormat2);
          records.push({ secondGlyph, value1, value2 });
        }
        return records;
      });
      return {
        kind: "pair",
        format: 1,
        coverage: loadCoverageTable(reader, offset + coverageOffset),
        valueFormat2,
        pairSets,
      };
    }
    case 2: {
      const coverageOffset = reader.readOffset16();
      const valueFormat1 = reader.readUInt16();
      const valueFormat2 = reader.readUInt16();
      const classDef1Offset = reader.readOffset16();
      const classDef2Offset = reader.readOffset16();
      const class1Count = reader.readUInt16();
      const class2Count = reader.readUInt16();
      const classRecords: { value1: ValueRecord; value2: ValueRecord }[][] = [];
      for (let c1 = 0; c1 < class1Count; c1++) {
        const row: { value1: ValueRecord; value2: ValueRecord }[] = [];
        for (let c2 = 0; c2 < class2Count; c2++) {
          const value1 = readValueRecord(reader, valueFormat1);
          const value2 = readValueRecord(reader, valueFormat2);
          row.push({ value1, value2 });
        }
        classRecords.push(row);
      }
      return {
        kind: "pair",
        format: 2,
        coverage: loadCoverageTable(reader, offset + coverageOffset),
        valueFormat2,
        classDef1: loadClassDefinitionTable(reader, offset + classDef1Offset),
        classDef2: loadClassDefinitionTable(reader, offset + classDef2Offset),
        classRecords,
      };
    }
    default:
      return invalidFormat("posFormat", posFormat, [1, 2]);
  }
}

function loadCursiveAttachment(reader: BigEndianBinaryReader, offset: number): GPosSubTable {
  const posFormat = readFormat(reader, offset);
  if (posFormat !== 1) return invalidFormat("posFormat", posFormat, [1]);
  // uint16 posFormat, Offset16 coverageOffset, uint16 entryExitCount,
  // EntryExitRecord { Offset16 entryAnchorOffset, Offset16 exitAnchorOffset }[entryExitCount]
  const coverageOffset = reader.readOffset16();
  const entryExitCount = reader.readUInt16();
  const raw = reader.readOffset16Array(entryExitCount * 2);
  const entryExitRecords: EntryExitRecord[] = [];
  for (let i = 0; i < entryExitCount; i++) {
    entryExitRecords.push({
      entry: loadOptionalAnchor(reader, offset, raw[i * 2]),
      exit: loadOptionalAnchor(reader, offset, raw[i * 2 + 1]),
    });
  }
  return {
    kind: "cursive",
    coverage: loadCoverageTable(reader, offset + coverageOffset),
    entryExitRecords,
  };
}

/**
 * MarkBasePos / MarkLigPos / MarkMarkPos share the header
 * posFormat, markCoverage, otherCoverage, markClassCount, markArray, otherArray.
 */
function readMarkAttachmentHeader(reader: BigEndianBinaryReader, offset: number) {
  const posFormat = readFormat(reader, offset);
  if (posFormat !== 1) return invalidFormat("posFormat", posFormat, [1]);
  const markCoverageOffset = reader.readOffset16();
  const otherCoverageOffset = reader.readOffset16();
  const markClassCount = reader.readUInt16();
  const markArrayOffset = reader.readOffset16();
  const otherArrayOffset = reader.readOffset16();
  return {
    markClassCount,
    markCoverage: loadCoverageTable(reader, offset + markCoverageOffset),
    otherCoverage: loadCoverageTable(reader, offset + otherCoverageOffset),
    marks: loadMarkArray(reader, offset + markArrayOffset),
    otherArrayOffset: offset + otherArrayOffset,
  };
}

function loadMarkToBaseAttachment(reader: BigEndianBinaryReader, offset: number): GPosSubTable {
  const h = readMarkAttachmentHeader(reader, offset);
  return {
    kind: "markToBase",
    markCoverage: h.markCoverage,
    baseCoverage: h.otherCoverage,
    marks: h.marks,
    baseAnchors: loadAnchorMatrix(reader, h.otherArrayOffset, h.markClassCount),
  };
}

function loadMarkToLigatureAttachment(reader: BigEndianBinaryReader, offset: number): GPosSubTable {
  const h = readMarkAttachmentHeader(reader, offset);
  // LigatureArray: uint16 ligatureCount, Offset16 ligatureAttachOffsets[ligatureCount]
  reader.seek(h.otherArrayOffset);
  const ligatureCount = reader.readUInt16();
  const attachOffsets = reader.readOffset16Array(ligatureCount);
  const ligatureAnchors = attachOffsets.map((o) =>
    // LigatureAttach has the same shape as a BaseArray: one row per component.
    loadAnchorMatrix(reader, h.otherArrayOffset + o, h.markClassCount)
  );
  return {
    kind: "markToLigature",
    markCoverage: h.markCoverage,
    ligatureCoverage: h.otherCoverage,
    marks: h.marks,
    ligatureAnchors,
  };
}

function loadMarkToMarkAttachment(reader: BigEndianBinaryReader, offset: number): GPosSubTable {
  const h = readMarkAttachmentHeader(reader, offset);
  return {
    kind: "markToMark",
    mark1Coverage: h.markCoverage,
    mark2Coverage: h.otherCoverage,
    marks: h.marks,
    mark2Anchors: loadAnchorMatrix(reader, h.otherArrayOffset, h.markClassCount),
  };
}

/**
 * Loads one GPOS subtable of `lookupType` at absolute `offset`. Extension
 * subtables (type 9) are unwrapped and report the type they wrap.
 */
export function loadGPosSubTable(
  reader: BigEndianBinaryReader,
  lookupType: number,
  offset: number
): LoadedSubTable<GPosSubTable> {
  switch (lookupType) {
    case 1:
      return { lookupType, subtable: loadSingleAdjustment(reader, offset) };
    case 2:
      return { lookupType, subtable: loadPairAdjustment(reader, offset) };
    case 3:
      return { lookupType, subtable: loadCursiveAttachment(reader, offset) };
    case 4:
      return { lookupType, subtable: loadMarkToBaseAttachment(reader, offset) };
    case 5:
      return { lookupType, subtable: loadMarkToLigatureAttachment(reader, offset) };
    case 6:
      return { lookupType, subtable: loadMarkToMarkAttachment(reader, offset) };
    case 7:
      return {
        lookupType,
        subtable: { kind: "context", context: loadSequenceContext(reader, offset, "posFormat") },
      };
    case 8:
      return {
        lookupType,
        subtable: {
          kind: "chainedContext",
          context: loadChainedSequenceContext(reader, offset, "posFormat"),
        },
      };
    case 9: {
      const posFormat = readFormat(reader, offset);
      if (posFormat !== 1) return invalidFormat("posFormat", posFormat, [1]);
      const extensionLookupType = reader.readUInt16();
      const extensionOffset = reader.readOffset32();
      if (extensionLookupType === 9) {
        return invalidFormat("extensionLookupType", extensionLookupType, [1, 2, 3, 4, 5, 6, 7, 8]);
      }
      return loadGPosSubTable(reader, extensionLookupType, offset + extensionOffset);
    }
    default:
      return invalidFormat("lookupType", lookupType, [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  }
}
