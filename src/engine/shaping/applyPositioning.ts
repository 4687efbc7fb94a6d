/**
 * Match-and-adjust for each GPOS subtable variant.
 * Adjustments add to what earlier lookups left, except mark attachment
 * (sets the mark's offset) and cursive exit (sets the exiting advance).
 * Cursive attachment follows left-to-right runs only.
 */

import type { GlyphPositioningCollection } from "../collections/GlyphPositioningCollection";
import { coverageIndexOf } from "../parsers/tables/coverage";
import { classOf } from "../parsers/tables/classDef";
import type { GDefTable } from "../parsers/tables/gdef";
import type { Anchor, GPosSubTable, PairValueRecord } from "../parsers/tables/gposSubtables";
import { applyContext, type NestedLookupApplier, nextIndex, prevIndex } from "./contextMatching";
import { type GlyphFilter, isMarkGlyph } from "./GlyphFilter";

export interface PositioningEnv {
  collection: GlyphPositioningCollection;
  filter: GlyphFilter;
  gdef?: GDefTable;
  applyNested: NestedLookupApplier;
}

function findPair(records: readonly PairValueRecord[], secondGlyph: number): PairValueRecord | undefined {
  let lo = 0;
  let hi = records.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const g = records[mid].secondGlyph;
    if (g === secondGlyph) return records[mid];
    if (g < secondGlyph) lo = mid + 1;
    else hi = mid - 1;
  }
  return undefined;
}

/** Nearest preceding glyph that is not a mark (GDEF class 3). */
function precedingNonMark(env: PositioningEnv, index: number): number {
  for (let j = index - 1; j >= 0; j--) {
    if (!isMarkGlyph(env.gdef, env.collection.glyphIdAt(j))) return j;
  }
  return -1;
}

/**
 * Places the mark at `markIndex` so its anchor lands on the base anchor of
 * the glyph at `baseIndex`, accounting for the advances between them.
 */
function attachMark(
  collection: GlyphPositioningCollection,
  markIndex: number,
  baseIndex: number,
  baseAnchor: Anchor,
  markAnchor: Anchor
): void {
  let advanceBetween = 0;
  for (let k = baseIndex; k < markIndex; k++) advanceBetween += collection.advanceAt(k).x;
  const baseOffset = collection.offsetAt(baseIndex);
  collection.setOffset(
    markIndex,
    baseAnchor.x - markAnchor.x + baseOffset.x - advanceBetween,
    baseAnchor.y - markAnchor.y + baseOffset.y
  );
}

/**
 * Applies `subtable` at `index`. Returns how many slots the walk steps past,
 * or null when the subtable does not apply.
 */
export function applyPositioning(subtable: GPosSubTable, env: PositioningEnv, index: number): number | null {
  const { collection } = env;
  const glyphId = collection.glyphIdAt(index);
  if (glyphId === 0) return null;

  switch (subtable.kind) {
    case "single": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      if (coverageIndex < 0) return null;
      const value = subtable.format === 1 ? subtable.value : subtable.values[coverageIndex];
      if (!value) return null;
      collection.adjust(index, value);
      return 1;
    }

    case "pair": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      if (coverageIndex < 0) return null;
      const second = nextIndex(collection, env.filter, index);
      if (second < 0) return null;
      const secondGlyph = collection.glyphIdAt(second);
      if (secondGlyph === 0) return null;

      const values =
        subtable.format === 1
          ? findPair(subtable.pairSets[coverageIndex] ?? [], secondGlyph)
          : subtable.classRecords[classOf(subtable.classDef1, glyphId)]?.[
              classOf(subtable.classDef2, secondGlyph)
            ];
      if (!values) return null;

      collection.adjust(index, values.value1);
      collection.adjust(second, values.value2);
      // The second glyph is consumed only when the pair adjusts it.
      return second - index + (subtable.valueFormat2 !== 0 ? 1 : 0);
    }

    case "cursive": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      const exit = coverageIndex < 0 ? null : subtable.entryExitRecords[coverageIndex]?.exit;
      if (!exit) return null;
      const next = nextIndex(collection, env.filter, index);
      if (next < 0) return null;
      const nextGlyph = collection.glyphIdAt(next);
      const nextCoverageIndex = nextGlyph === 0 ? -1 : coverageIndexOf(subtable.coverage, nextGlyph);
      const entry = nextCoverageIndex < 0 ? null : subtable.entryExitRecords[nextCoverageIndex]?.entry;
      if (!entry) return null;

      // TODO: right-to-left runs and the RIGHT_TO_LEFT lookup flag need their own attachment math.
      const curOffset = collection.offsetAt(index);
      collection.setAdvance(index, exit.x + curOffset.x);
      const nextOffset = collection.offsetAt(next);
      const d = entry.x + nextOffset.x;
      collection.setAdvance(next, collection.advanceAt(next).x - d);
      collection.setOffset(next, nextOffset.x - d, curOffset.y + exit.y - entry.y);
      return 1;
    }

    case "markToBase": {
      const markIndex = coverageIndexOf(subtable.markCoverage, glyphId);
      if (markIndex < 0) return null;
      const base = precedingNonMark(env, index);
      if (base < 0 || collection.glyphIdAt(base) === 0) return null;
      const baseCoverageIndex = coverageIndexOf(subtable.baseCoverage, collection.glyphIdAt(base));
      if (baseCoverageIndex < 0) return null;

      const mark = subtable.marks[markIndex];
      const baseAnchor = mark ? subtable.baseAnchors[baseCoverageIndex]?.[mark.markClass] : null;
      if (!mark || !baseAnchor) return null;
      attachMark(collection, index, base, baseAnchor, mark.anchor);
      return 1;
    }

    case "markToLigature": {
      const markIndex = coverageIndexOf(subtable.markCoverage, glyphId);
      if (markIndex < 0) return null;
      const ligature = precedingNonMark(env, index);
      if (ligature < 0 || collection.glyphIdAt(ligature) === 0) return null;
      const ligatureCoverageIndex = coverageIndexOf(
        subtable.ligatureCoverage,
        collection.glyphIdAt(ligature)
      );
      if (ligatureCoverageIndex < 0) return null;

      const components = subtable.ligatureAnchors[ligatureCoverageIndex] ?? [];
      if (components.length === 0) return null;
      const markSlot = collection.slotAt(index);
      const ligSlot = collection.slotAt(ligature);
      const component =
        markSlot.ligatureId !== 0 &&
        markSlot.ligatureId === ligSlot.ligatureId &&
        markSlot.ligatureComponent > 0
          ? Math.min(markSlot.ligatureComponent, components.length) - 1
          : components.length - 1;

      const mark = subtable.marks[markIndex];
      const anchor = mark ? components[component]?.[mark.markClass] : null;
      if (!mark || !anchor) return null;
      attachMark(collection, index, ligature, anchor, mark.anchor);
      return 1;
    }

    case "markToMark": {
      const mark1Index = coverageIndexOf(subtable.mark1Coverage, glyphId);
      if (mark1Index < 0) return null;
      const previous = prevIndex(collection, env.filter, index);
      if (previous < 0) return null;
      const previousGlyph = collection.glyphIdAt(previous);
      if (previousGlyph === 0) return null;
      if (env.gdef && !isMarkGlyph(env.gdef, previousGlyph)) return null;
      const mark2Index = coverageIndexOf(subtable.mark2Coverage, previousGlyph);
      if (mark2Index < 0) return null;

      const mark = subtable.marks[mark1Index];
      const anchor = mark ? subtable.mark2Anchors[mark2Index]?.[mark.markClass] : null;
      if (!mark || !anchor) return null;
      attachMark(collection, index, previous, anchor, mark.anchor);
      return 1;
    }

    case "context":
    case "chainedContext":
      return applyContext(subtable.context, collection, env.filter, index, env.applyNested);
  }
}
