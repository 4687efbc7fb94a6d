/**
 * Coverage tables (OpenType common table formats 1 and 2).
 * https://learn.microsoft.com/en-us/typography/opentype/spec/chapter2#coverage-table
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { invalidFormat } from "../FontErrors";

export interface CoverageRange {
  start: number;
  end: number;
  startCoverageIndex: number;
}

export type CoverageTable =
  | { format: 1; glyphArray: readonly number[] }
  | { format: 2; ranges: readonly CoverageRange[] };

export function loadCoverageTable(reader: BigEndianBinaryReader, offset: number): CoverageTable {
  reader.seek(offset);
  const coverageFormat = reader.readUInt16();

  switch (coverageFormat) {
    case 1: {
      // uint16 glyphCount, uint16 glyphArray[glyphCount]
      const glyphCount = reader.readUInt16();
      return { format: 1, glyphArray: reader.readUInt16Array(glyphCount) };
    }
    case 2: {
      // uint16 rangeCount, RangeRecord { start, end, startCoverageIndex }[rangeCount]
      const rangeCount = reader.readUInt16();
      const raw = reader.readUInt16Array(rangeCount * 3);
      const ranges: CoverageRange[] = [];
      for (let i = 0; i < rangeCount; i++) {
        ranges.push({ start: raw[i * 3], end: raw[i * 3 + 1], startCoverageIndex: raw[i * 3 + 2] });
      }
      return { format: 2, ranges };
    }
    default:
      return invalidFormat("coverageFormat", coverageFormat, [1, 2]);
  }
}

/**
 * Dense coverage index of `glyphId`, or -1 when the glyph is not covered.
 */
export function coverageIndexOf(table: CoverageTable, glyphId: number): number {
  if (table.format === 1) {
    const glyphs = table.glyphArray;
    let lo = 0;
    let hi = glyphs.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const g = glyphs[mid];
      if (g === glyphId) return mid;
      if (g < glyphId) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }

  const ranges = table.ranges;
  let lo = 0;
  let hi = ranges.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const r = ranges[mid];
    if (glyphId < r.start) hi = mid - 1;
    else if (glyphId > r.end) lo = mid + 1;
    else return r.startCoverageIndex + glyphId - r.start;
  }
  return -1;
}
