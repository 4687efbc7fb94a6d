/**
 * GSUB and GPOS table headers.
 * Loads ScriptList, FeatureList and LookupList, then checks every lookup
 * index that features or contextual rules refer to.
 */

import { layoutLogger } from "../../logger";
import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { InvalidFontFileError } from "../FontErrors";
import { type FeatureList, loadFeatureList } from "./featureList";
import { GPOS_LOOKUP_TYPES, GSUB_LOOKUP_TYPES } from "./formatters";
import { type GPosSubTable, loadGPosSubTable } from "./gposSubtables";
import { type GSubSubTable, loadGSubSubTable } from "./gsubSubtables";
import { type LookupList, loadLookupList, type SubTableLoader } from "./lookupList";
import { loadScriptList, type ScriptList } from "./scriptList";
import { contextLookupRecords, type SequenceLookupRecord } from "./sequenceContext";

export interface LayoutTable<T> {
  tableTag: "GSUB" | "GPOS";
  majorVersion: number;
  minorVersion: number;
  scriptList: ScriptList;
  featureList: FeatureList;
  lookupList: LookupList<T>;
}

export type GSubTable = LayoutTable<GSubSubTable>;
export type GPosTable = LayoutTable<GPosSubTable>;

function nestedLookupRecords(subtable: GSubSubTable | GPosSubTable): SequenceLookupRecord[] {
  return subtable.kind === "context" || subtable.kind === "chainedContext"
    ? contextLookupRecords(subtable.context)
    : [];
}

function loadLayoutTable<T extends GSubSubTable | GPosSubTable>(
  tableTag: "GSUB" | "GPOS",
  reader: BigEndianBinaryReader,
  offset: number,
  loadSubTable: SubTableLoader<T>
): LayoutTable<T> {
  const startTime = Date.now();

  // uint16 majorVersion, uint16 minorVersion, Offset16 scriptListOffset,
  // Offset16 featureListOffset, Offset16 lookupListOffset,
  // Offset32 featureVariationsOffset (1.1, not applied)
  reader.seek(offset);
  const majorVersion = reader.readUInt16();
  const minorVersion = reader.readUInt16();
  if (majorVersion !== 1 || minorVersion > 1) {
    throw new InvalidFontFileError(
      `Unsupported ${tableTag} version ${majorVersion}.${minorVersion}. Should be '1.0' or '1.1'.`,
      { field: "majorVersion", value: `${majorVersion}.${minorVersion}` }
    );
  }
  const scriptListOffset = reader.readOffset16();
  const featureListOffset = reader.readOffset16();
  const lookupListOffset = reader.readOffset16();

  const scriptList: ScriptList =
    scriptListOffset === 0 ? { scripts: new Map() } : loadScriptList(reader, offset + scriptListOffset);
  const featureList: FeatureList =
    featureListOffset === 0
      ? { featureListTables: [] }
      : loadFeatureList(reader, offset + featureListOffset);
  const lookupList: LookupList<T> =
    lookupListOffset === 0
      ? { lookups: [] }
      : loadLookupList(reader, offset + lookupListOffset, loadSubTable);

  validateLookupReferences(tableTag, featureList, lookupList);

  const typeNames = tableTag === "GSUB" ? GSUB_LOOKUP_TYPES : GPOS_LOOKUP_TYPES;
  layoutLogger.timed("debug", "LayoutTables", `load${tableTag}`, startTime, {
    scripts: scriptList.scripts.size,
    features: featureList.featureListTables.length,
    lookups: lookupList.lookups.map((l) => typeNames[l.lookupType] ?? `type ${l.lookupType}`),
  });

  return { tableTag, majorVersion, minorVersion, scriptList, featureList, lookupList };
}

/**
 * Fails on any lookup index outside the LookupList, whether named by a
 * feature or by a contextual rule's lookup record.
 */
function validateLookupReferences<T extends GSubSubTable | GPosSubTable>(
  tableTag: string,
  featureList: FeatureList,
  lookupList: LookupList<T>
): void {
  const lookupCount = lookupList.lookups.length;
  const check = (lookupListIndex: number, where: string) => {
    if (lookupListIndex >= lookupCount) {
      throw new InvalidFontFileError(
        `${tableTag} ${where} references lookup ${lookupListIndex}, but the LookupList has ${lookupCount} lookups`,
        { field: "lookupListIndex", value: lookupListIndex }
      );
    }
  };

  for (const feature of featureList.featureListTables) {
    for (const i of feature.lookupListIndices) check(i, `feature '${feature.featureTag}'`);
  }
  for (const lookup of lookupList.lookups) {
    for (const subtable of lookup.subtables) {
      for (const record of nestedLookupRecords(subtable)) {
        check(record.lookupListIndex, `lookup ${lookup.index}`);
      }
    }
  }
}

export function loadGSubTable(reader: BigEndianBinaryReader, offset: number): GSubTable {
  return loadLayoutTable("GSUB", reader, offset, loadGSubSubTable);
}

export function loadGPosTable(reader: BigEndianBinaryReader, offset: number): GPosTable {
  return loadLayoutTable("GPOS", reader, offset, loadGPosSubTable);
}
