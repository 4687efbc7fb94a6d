/**
 * LookupList and Lookup tables, generic over the GSUB/GPOS subtable variant.
 * https://learn.microsoft.com/en-us/typography/opentype/spec/chapter2#lookup-list-table
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { InvalidFontFileError } from "../FontErrors";

export const LookupFlag = {
  RIGHT_TO_LEFT: 0x0001,
  IGNORE_BASE_GLYPHS: 0x0002,
  IGNORE_LIGATURES: 0x0004,
  IGNORE_MARKS: 0x0008,
  USE_MARK_FILTERING_SET: 0x0010,
  MARK_ATTACHMENT_TYPE_MASK: 0xff00,
} as const;

export interface LoadedSubTable<T> {
  /** Effective lookup type (the wrapped type for extension subtables) */
  lookupType: number;
  subtable: T;
}

export type SubTableLoader<T> = (
  reader: BigEndianBinaryReader,
  lookupType: number,
  offset: number
) => LoadedSubTable<T>;

export interface Lookup<T> {
  /** Position in the LookupList */
  index: number;
  lookupType: number;
  lookupFlag: number;
  markFilteringSet?: number;
  /** Tried in order; the first that applies wins */
  subtables: readonly T[];
}

export interface LookupList<T> {
  lookups: readonly Lookup<T>[];
}

export function loadLookupList<T>(
  reader: BigEndianBinaryReader,
  offset: number,
  loadSubTable: SubTableLoader<T>
): LookupList<T> {
  // uint16 lookupCount, Offset16 lookupOffsets[lookupCount] (from LookupList start)
  reader.seek(offset);
  const lookupCount = reader.readUInt16();
  const lookupOffsets = reader.readOffset16Array(lookupCount);

  const lookups = lookupOffsets.map((lookupOffset, index) =>
    loadLookup(reader, offset + lookupOffset, index, loadSubTable)
  );
  return { lookups };
}

function loadLookup<T>(
  reader: BigEndianBinaryReader,
  offset: number,
  index: number,
  loadSubTable: SubTableLoader<T>
): Lookup<T> {
  // uint16 lookupType, uint16 lookupFlag, uint16 subTableCount,
  // Offset16 subtableOffsets[subTableCount], uint16 markFilteringSet (if flag 0x10)
  reader.seek(offset);
  const declaredType = reader.readUInt16();
  const lookupFlag = reader.readUInt16();
  const subTableCount = reader.readUInt16();
  const subtableOffsets = reader.readOffset16Array(subTableCount);
  const markFilteringSet =
    lookupFlag & LookupFlag.USE_MARK_FILTERING_SET ? reader.readUInt16() : undefined;

  let lookupType = declaredType;
  const subtables: T[] = [];
  subtableOffsets.forEach((subtableOffset, i) => {
    const loaded = loadSubTable(reader, declaredType, offset + subtableOffset);
    if (i === 0) {
      lookupType = loaded.lookupType;
    } else if (loaded.lookupType !== lookupType) {
      throw new InvalidFontFileError(
        `Lookup ${index} mixes subtable types ${lookupType} and ${loaded.lookupType}`,
        { field: "extensionLookupType", value: loaded.lookupType }
      );
    }
    subtables.push(loaded.subtable);
  });

  return markFilteringSet === undefined
    ? { index, lookupType, lookupFlag, subtables }
    : { index, lookupType, lookupFlag, markFilteringSet, subtables };
}
