/**
 * ScriptList + Script + LangSys tables, and resolution of a (script, language)
 * pair to the ordered set of features it enables.
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { InvalidFontFileError } from "../FontErrors";
import type { FeatureList } from "./featureList";
import { normalizeTag } from "./formatters";

export interface LangSysTable {
  /** FeatureList index, or null when the language system has none */
  requiredFeatureIndex: number | null;
  featureIndices: readonly number[];
}

export interface ScriptTable {
  scriptTag: string;
  defaultLangSys: LangSysTable | null;
  langSys: ReadonlyMap<string, LangSysTable>;
}

export interface ScriptList {
  scripts: ReadonlyMap<string, ScriptTable>;
}

/** One feature enabled for a script/language, with the lookups it names. */
export interface ResolvedFeature {
  featureTag: string;
  lookupIndices: readonly number[];
  required: boolean;
}

const NO_REQUIRED_FEATURE = 0xffff;

function loadLangSys(reader: BigEndianBinaryReader, offset: number): LangSysTable {
  // Offset16 lookupOrderOffset (reserved), uint16 requiredFeatureIndex,
  // uint16 featureIndexCount, uint16 featureIndices[featureIndexCount]
  reader.seek(offset);
  reader.readOffset16();
  const requiredFeatureIndex = reader.readUInt16();
  const featureIndexCount = reader.readUInt16();
  return {
    requiredFeatureIndex: requiredFeatureIndex === NO_REQUIRED_FEATURE ? null : requiredFeatureIndex,
    featureIndices: reader.readUInt16Array(featureIndexCount),
  };
}

function loadScriptTable(
  reader: BigEndianBinaryReader,
  scriptTag: string,
  offset: number
): ScriptTable {
  reader.seek(offset);
  const defaultLangSysOffset = reader.readOffset16();
  const langSysCount = reader.readUInt16();
  const records: Array<{ tag: string; langSysOffset: number }> = [];
  for (let i = 0; i < langSysCount; i++) {
    const tag = reader.readTag();
    const langSysOffset = reader.readOffset16();
    records.push({ tag, langSysOffset });
  }

  const defaultLangSys =
    defaultLangSysOffset === 0 ? null : loadLangSys(reader, offset + defaultLangSysOffset);
  const langSys = new Map<string, LangSysTable>();
  for (const r of records) langSys.set(r.tag, loadLangSys(reader, offset + r.langSysOffset));
  return { scriptTag, defaultLangSys, langSys };
}

export function loadScriptList(reader: BigEndianBinaryReader, offset: number): ScriptList {
  // uint16 scriptCount, ScriptRecord { Tag scriptTag, Offset16 scriptOffset }[scriptCount]
  reader.seek(offset);
  const scriptCount = reader.readUInt16();
  const records: Array<{ tag: string; scriptOffset: number }> = [];
  for (let i = 0; i < scriptCount; i++) {
    const tag = reader.readTag();
    const scriptOffset = reader.readOffset16();
    records.push({ tag, scriptOffset });
  }

  const scripts = new Map<string, ScriptTable>();
  for (const r of records) scripts.set(r.tag, loadScriptTable(reader, r.tag, offset + r.scriptOffset));
  return { scripts };
}

const FALLBACK_SCRIPTS = ["DFLT", "dflt", "latn"];

/**
 * Picks the LangSys for `script`/`language`, falling back to the script's
 * default LangSys and then to DFLT, dflt and latn.
 */
export function selectLangSys(
  scriptList: ScriptList,
  script: string,
  language: string
): LangSysTable | null {
  const scriptTable =
    scriptList.scripts.get(normalizeTag(script)) ??
    FALLBACK_SCRIPTS.map((s) => scriptList.scripts.get(s)).find((s) => s !== undefined);
  if (!scriptTable) return null;
  return scriptTable.langSys.get(normalizeTag(language)) ?? scriptTable.defaultLangSys;
}

/**
 * Resolves the features a script/language enables, required feature first,
 * the rest in LangSys order.
 */
export function resolveFeatures(
  scriptList: ScriptList,
  featureList: FeatureList,
  script: string,
  language: string
): ResolvedFeature[] {
  const langSys = selectLangSys(scriptList, script, language);
  if (!langSys) return [];

  const tables = featureList.featureListTables;
  const toResolved = (featureIndex: number, required: boolean): ResolvedFeature => {
    const table = tables[featureIndex];
    if (!table) {
      throw new InvalidFontFileError(
        `Feature index ${featureIndex} is outside the FeatureList (${tables.length} features)`,
        { field: "featureIndex", value: featureIndex }
      );
    }
    return { featureTag: table.featureTag, lookupIndices: table.lookupListIndices, required };
  };

  const out: ResolvedFeature[] = [];
  if (langSys.requiredFeatureIndex !== null) out.push(toResolved(langSys.requiredFeatureIndex, true));
  for (const fi of langSys.featureIndices) out.push(toResolved(fi, false));
  return out;
}
