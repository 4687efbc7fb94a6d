/**
 * Class definition tables (formats 1 and 2).
 * Any glyph not listed belongs to class 0.
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { invalidFormat } from "../FontErrors";

export interface ClassRange {
  start: number;
  end: number;
  classValue: number;
}

export type ClassDefinitionTable =
  | { format: 1; startGlyphId: number; classValues: readonly number[] }
  | { format: 2; ranges: readonly ClassRange[] };

export function loadClassDefinitionTable(
  reader: BigEndianBinaryReader,
  offset: number
): ClassDefinitionTable {
  reader.seek(offset);
  const classFormat = reader.readUInt16();

  switch (classFormat) {
    case 1: {
      const startGlyphId = reader.readUInt16();
      const glyphCount = reader.readUInt16();
      return { format: 1, startGlyphId, classValues: reader.readUInt16Array(glyphCount) };
    }
    case 2: {
      const classRangeCount = reader.readUInt16();
      const raw = reader.readUInt16Array(classRangeCount * 3);
      const ranges: ClassRange[] = [];
      for (let i = 0; i < classRangeCount; i++) {
        ranges.push({ start: raw[i * 3], end: raw[i * 3 + 1], classValue: raw[i * 3 + 2] });
      }
      return { format: 2, ranges };
    }
    default:
      return invalidFormat("classFormat", classFormat, [1, 2]);
  }
}

/**
 * Class listed for `glyphId`, or -1 when the table does not list the glyph.
 */
export function classIndexOf(table: ClassDefinitionTable, glyphId: number): number {
  if (table.format === 1) {
    const i = glyphId - table.startGlyphId;
    return i >= 0 && i < table.classValues.length ? table.classValues[i] : -1;
  }

  const ranges = table.ranges;
  let lo = 0;
  let hi = ranges.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const r = ranges[mid];
    if (glyphId < r.start) hi = mid - 1;
    else if (glyphId > r.end) lo = mid + 1;
    else return r.classValue;
  }
  return -1;
}

/** Class of `glyphId` with the default class 0 applied. */
export function classOf(table: ClassDefinitionTable | undefined, glyphId: number): number {
  if (!table) return 0;
  const c = classIndexOf(table, glyphId);
  return c < 0 ? 0 : c;
}
