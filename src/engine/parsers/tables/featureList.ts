/**
 * FeatureList + Feature tables.
 * Records are stored alphabetically by tag; that order says nothing about the
 * order lookups are applied in.
 * https://learn.microsoft.com/en-us/typography/opentype/spec/chapter2#feature-list-table
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";

export interface FeatureListTable {
  featureTag: string;
  /** Indices into the LookupList */
  lookupListIndices: readonly number[];
}

export interface FeatureList {
  featureListTables: readonly FeatureListTable[];
}

export function loadFeatureList(reader: BigEndianBinaryReader, offset: number): FeatureList {
  // uint16 featureCount, FeatureRecord { Tag featureTag, Offset16 featureOffset }[featureCount]
  reader.seek(offset);
  const featureCount = reader.readUInt16();
  const records: Array<{ featureTag: string; featureOffset: number }> = [];
  for (let i = 0; i < featureCount; i++) {
    const featureTag = reader.readTag();
    const featureOffset = reader.readOffset16();
    records.push({ featureTag, featureOffset });
  }

  // Feature tables are loaded once every record is known, so the reader
  // walks the record array in one pass.
  const featureListTables = records.map((r) =>
    loadFeatureListTable(reader, r.featureTag, offset + r.featureOffset)
  );
  return { featureListTables };
}

export function loadFeatureListTable(
  reader: BigEndianBinaryReader,
  featureTag: string,
  offset: number
): FeatureListTable {
  // Offset16 featureParamsOffset, uint16 lookupIndexCount, uint16 lookupListIndices[lookupIndexCount]
  reader.seek(offset);
  reader.readOffset16(); // featureParams (size, ssXX, cvXX names) are not used for shaping
  const lookupIndexCount = reader.readUInt16();
  return { featureTag, lookupListIndices: reader.readUInt16Array(lookupIndexCount) };
}
