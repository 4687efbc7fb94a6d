/**
 * GSUB lookup subtable decoders.
 * Each lookup type reads its format discriminator first and dispatches; the
 * result is a tagged variant applied by shaping/applySubstitution.
 * https://learn.microsoft.com/en-us/typography/opentype/spec/gsub
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { invalidFormat } from "../FontErrors";
import { type CoverageTable, loadCoverageTable } from "./coverage";
import type { LoadedSubTable } from "./lookupList";
import {
  loadChainedSequenceContext,
  loadSequenceContext,
  type SequenceContext,
} from "./sequenceContext";

export interface LigatureRule {
  ligatureGlyph: number;
  /** Components after the first (the first is the coverage glyph) */
  components: readonly number[];
}

export type GSubSubTable =
  | { kind: "single"; format: 1; coverage: CoverageTable; deltaGlyphId: number }
  | { kind: "single"; format: 2; coverage: CoverageTable; substitutes: readonly number[] }
  | { kind: "multiple"; coverage: CoverageTable; sequences: readonly (readonly number[])[] }
  | { kind: "alternate"; coverage: CoverageTable; alternateSets: readonly (readonly number[])[] }
  | { kind: "ligature"; coverage: CoverageTable; ligatureSets: readonly (readonly LigatureRule[])[] }
  | { kind: "context"; context: SequenceContext }
  | { kind: "chainedContext"; context: SequenceContext }
  | {
      kind: "reverseChainedSingle";
      coverage: CoverageTable;
      backtrackCoverages: readonly CoverageTable[];
      lookaheadCoverages: readonly CoverageTable[];
      substitutes: readonly number[];
    };

function readFormat(reader: BigEndianBinaryReader, offset: number): number {
  reader.seek(offset);
  return reader.readUInt16();
}

/**
 * Reads `count` Offset16s then the uint16 arrays they point to
 * (uint16 glyphCount, uint16 glyphs[glyphCount]).
 */
function loadGlyphArrays(
  reader: BigEndianBinaryReader,
  subtableOffset: number,
  count: number
): number[][] {
  const offsets = reader.readOffset16Array(count);
  return offsets.map((o) => {
    reader.seek(subtableOffset + o);
    const glyphCount = reader.readUInt16();
    return reader.readUInt16Array(glyphCount);
  });
}

function loadSingleSubstitution(reader: BigEndianBinaryReader, offset: number): GSubSubTable {
  const substFormat = readFormat(reader, offset);
  switch (substFormat) {
    case 1: {
      const coverageOffset = reader.readOffset16();
      const deltaGlyphId = reader.readInt16();
      return {
        kind: "single",
        format: 1,
        coverage: loadCoverageTable(reader, offset + coverageOffset),
        deltaGlyphId,
      };
    }
    case 2: {
      const coverageOffset = reader.readOffset16();
      const glyphCount = reader.readUInt16();
      const substitutes = reader.readUInt16Array(glyphCount);
      return {
        kind: "single",
        format: 2,
        coverage: loadCoverageTable(reader, offset + coverageOffset),
        substitutes,
      };
    }
    default:
      return invalidFormat("substFormat", substFormat, [1, 2]);
  }
}

function loadMultipleSubstitution(reader: BigEndianBinaryReader, offset: number): GSubSubTable {
  const substFormat = readFormat(reader, offset);
  if (substFormat !== 1) return invalidFormat("substFormat", substFormat, [1]);
  const coverageOffset = reader.readOffset16();
  const sequenceCount = reader.readUInt16();
  const sequences = loadGlyphArrays(reader, offset, sequenceCount);
  return {
    kind: "multiple",
    coverage: loadCoverageTable(reader, offset + coverageOffset),
    sequences,
  };
}

function loadAlternateSubstitution(reader: BigEndianBinaryReader, offset: number): GSubSubTable {
  const substFormat = readFormat(reader, offset);
  if (substFormat !== 1) return invalidFormat("substFormat", substFormat, [1]);
  const coverageOffset = reader.readOffset16();
  const alternateSetCount = reader.readUInt16();
  const alternateSets = loadGlyphArrays(reader, offset, alternateSetCount);
  return {
    kind: "alternate",
    coverage: loadCoverageTable(reader, offset + coverageOffset),
    alternateSets,
  };
}

function loadLigatureSubstitution(reader: BigEndianBinaryReader, offset: number): GSubSubTable {
  const substFormat = readFormat(reader, offset);
  if (substFormat !== 1) return invalidFormat("substFormat", substFormat, [1]);
  const coverageOffset = reader.readOffset16();
  const ligatureSetCount = reader.readUInt16();
  const setOffsets = reader.readOffset16Array(ligatureSetCount);

  const ligatureSets = setOffsets.map((setOffset) => {
    const setBase = offset + setOffset;
    reader.seek(setBase);
    const ligatureCount = reader.readUInt16();
    const ligatureOffsets = reader.readOffset16Array(ligatureCount);
    return ligatureOffsets.map((ligOffset): LigatureRule => {
      // Ligature: uint16 ligatureGlyph, uint16 componentCount,
      // uint16 componentGlyphIDs[componentCount - 1]
      reader.seek(setBase + ligOffset);
      const ligatureGlyph = reader.readUInt16();
      const componentCount = reader.readUInt16();
      const components = reader.readUInt16Array(Math.max(0, componentCount - 1));
      return { ligatureGlyph, components };
    });
  });

  return {
    kind: "ligature",
    coverage: loadCoverageTable(reader, offset + coverageOffset),
    ligatureSets,
  };
}

function loadReverseChainedSingleSubstitution(
  reader: BigEndianBinaryReader,
  offset: number
): GSubSubTable {
  const substFormat = readFormat(reader, offset);
  if (substFormat !== 1) return invalidFormat("substFormat", substFormat, [1]);
  const coverageOffset = reader.readOffset16();
  const backtrackGlyphCount = reader.readUInt16();
  const backtrackOffsets = reader.readOffset16Array(backtrackGlyphCount);
  const lookaheadGlyphCount = reader.readUInt16();
  const lookaheadOffsets = reader.readOffset16Array(lookaheadGlyphCount);
  const glyphCount = reader.readUInt16();
  const substitutes = reader.readUInt16Array(glyphCount);
  return {
    kind: "reverseChainedSingle",
    coverage: loadCoverageTable(reader, offset + coverageOffset),
    backtrackCoverages: backtrackOffsets.map((o) => loadCoverageTable(reader, offset + o)),
    lookaheadCoverages: lookaheadOffsets.map((o) => loadCoverageTable(reader, offset + o)),
    substitutes,
  };
}

/**
 * Loads one GSUB subtable of `lookupType` at absolute `offset`. Extension
 * subtables (type 7) are unwrapped and report the type they wrap.
 */
export function loadGSubSubTable(
  reader: BigEndianBinaryReader,
  lookupType: number,
  offset: number
): LoadedSubTable<GSubSubTable> {
  switch (lookupType) {
    case 1:
      return { lookupType, subtable: loadSingleSubstitution(reader, offset) };
    case 2:
      return { lookupType, subtable: loadMultipleSubstitution(reader, offset) };
    case 3:
      return { lookupType, subtable: loadAlternateSubstitution(reader, offset) };
    case 4:
      return { lookupType, subtable: loadLigatureSubstitution(reader, offset) };
    case 5:
      return {
        lookupType,
        subtable: { kind: "context", context: loadSequenceContext(reader, offset, "substFormat") },
      };
    case 6:
      return {
        lookupType,
        subtable: {
          kind: "chainedContext",
          context: loadChainedSequenceContext(reader, offset, "substFormat"),
        },
      };
    case 7: {
      // ExtensionSubstFormat1: uint16 substFormat, uint16 extensionLookupType, Offset32 extensionOffset
      const substFormat = readFormat(reader, offset);
      if (substFormat !== 1) return invalidFormat("substFormat", substFormat, [1]);
      const extensionLookupType = reader.readUInt16();
      const extensionOffset = reader.readOffset32();
      if (extensionLookupType === 7) {
        return invalidFormat("extensionLookupType", extensionLookupType, [1, 2, 3, 4, 5, 6, 8]);
      }
      return loadGSubSubTable(reader, extensionLookupType, offset + extensionOffset);
    }
    case 8:
      return { lookupType, subtable: loadReverseChainedSingleSubstitution(reader, offset) };
    default:
      return invalidFormat("lookupType", lookupType, [1, 2, 3, 4, 5, 6, 7, 8]);
  }
}
