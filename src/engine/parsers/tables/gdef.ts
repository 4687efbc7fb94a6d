/**
 * GDEF: glyph classes, mark attachment classes and mark glyph sets used by
 * lookup flags. Attachment point and ligature caret lists are not read.
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { InvalidFontFileError } from "../FontErrors";
import { type ClassDefinitionTable, classOf, loadClassDefinitionTable } from "./classDef";
import { type CoverageTable, coverageIndexOf, loadCoverageTable } from "./coverage";

export const GlyphClass = {
  BASE: 1,
  LIGATURE: 2,
  MARK: 3,
  COMPONENT: 4,
} as const;

export interface GDefTable {
  glyphClassDef?: ClassDefinitionTable;
  markAttachClassDef?: ClassDefinitionTable;
  markGlyphSets: readonly CoverageTable[];
}

export function loadGDefTable(reader: BigEndianBinaryReader, offset: number): GDefTable {
  // uint16 majorVersion, uint16 minorVersion, Offset16 glyphClassDefOffset,
  // Offset16 attachListOffset, Offset16 ligCaretListOffset, Offset16 markAttachClassDefOffset,
  // Offset16 markGlyphSetsDefOffset (1.2+), Offset32 itemVarStoreOffset (1.3)
  reader.seek(offset);
  const majorVersion = reader.readUInt16();
  const minorVersion = reader.readUInt16();
  if (majorVersion !== 1) {
    throw new InvalidFontFileError(`Unsupported GDEF version ${majorVersion}.${minorVersion}`, {
      field: "majorVersion",
      value: majorVersion,
    });
  }
  const glyphClassDefOffset = reader.readOffset16();
  reader.readOffset16(); // attachList
  reader.readOffset16(); // ligCaretList
  const markAttachClassDefOffset = reader.readOffset16();
  const markGlyphSetsDefOffset = minorVersion >= 2 ? reader.readOffset16() : 0;

  const table: GDefTable = { markGlyphSets: [] };
  if (glyphClassDefOffset !== 0) {
    table.glyphClassDef = loadClassDefinitionTable(reader, offset + glyphClassDefOffset);
  }
  if (markAttachClassDefOffset !== 0) {
    table.markAttachClassDef = loadClassDefinitionTable(reader, offset + markAttachClassDefOffset);
  }
  if (markGlyphSetsDefOffset !== 0) {
    // uint16 format (1), uint16 markGlyphSetCount, Offset32 coverageOffsets[markGlyphSetCount]
    const setsBase = offset + markGlyphSetsDefOffset;
    reader.seek(setsBase);
    const format = reader.readUInt16();
    if (format !== 1) {
      throw new InvalidFontFileError(`Invalid value for 'markGlyphSetsFormat' ${format}. Should be '1'.`, {
        field: "markGlyphSetsFormat",
        value: format,
      });
    }
    const count = reader.readUInt16();
    const coverageOffsets: number[] = [];
    for (let i = 0; i < count; i++) coverageOffsets.push(reader.readOffset32());
    table.markGlyphSets = coverageOffsets.map((o) => loadCoverageTable(reader, setsBase + o));
  }
  return table;
}

export function glyphClassOf(gdef: GDefTable | undefined, glyphId: number): number {
  return classOf(gdef?.glyphClassDef, glyphId);
}

export function markAttachClassOf(gdef: GDefTable | undefined, glyphId: number): number {
  return classOf(gdef?.markAttachClassDef, glyphId);
}

export function isInMarkGlyphSet(gdef: GDefTable | undefined, setIndex: number, glyphId: number): boolean {
  const set = gdef?.markGlyphSets[setIndex];
  return set !== undefined && coverageIndexOf(set, glyphId) >= 0;
}
