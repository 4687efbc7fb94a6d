/**
 * Match-and-rewrite for each GSUB subtable variant.
 * https://learn.microsoft.com/en-us/typography/opentype/spec/gsub
 */

import type { Tag } from "../../types/layout.types";
import type { GlyphSubstitutionCollection } from "../collections/GlyphSubstitutionCollection";
import { coverageIndexOf } from "../parsers/tables/coverage";
import type { GSubSubTable, LigatureRule } from "../parsers/tables/gsubSubtables";
import { applyContext, matchInput, type NestedLookupApplier, nextIndex, prevIndex } from "./contextMatching";
import type { GlyphFilter } from "./GlyphFilter";

export interface SubstitutionEnv {
  collection: GlyphSubstitutionCollection;
  filter: GlyphFilter;
  /** Feature the lookup runs under; selects the alternate index */
  feature: Tag;
  alternates: Readonly<Record<Tag, number>>;
  applyNested: NestedLookupApplier;
}

/**
 * Applies `subtable` at `index`. Returns how many slots the walk steps past
 * (0 when the slot was deleted), or null when the subtable does not apply.
 */
export function applySubstitution(subtable: GSubSubTable, env: SubstitutionEnv, index: number): number | null {
  const { collection } = env;
  const glyphId = collection.glyphIdAt(index);
  if (glyphId === 0) return null;

  switch (subtable.kind) {
    case "single": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      if (coverageIndex < 0) return null;
      const substitute =
        subtable.format === 1
          ? (glyphId + subtable.deltaGlyphId) & 0xffff
          : subtable.substitutes[coverageIndex];
      if (substitute === undefined) return null;
      collection.setGlyphId(index, substitute);
      return 1;
    }

    case "multiple": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      const sequence = coverageIndex < 0 ? undefined : subtable.sequences[coverageIndex];
      if (!sequence) return null;
      collection.replaceRange(index, 1, sequence);
      return sequence.length;
    }

    case "alternate": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      const alternates = coverageIndex < 0 ? undefined : subtable.alternateSets[coverageIndex];
      const alternate = alternates?.[env.alternates[env.feature] ?? 0];
      if (alternate === undefined) return null;
      collection.setGlyphId(index, alternate);
      return 1;
    }

    case "ligature": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      if (coverageIndex < 0) return null;
      for (const rule of subtable.ligatureSets[coverageIndex] ?? []) {
        const positions = matchInput(collection, env.filter, index, rule.components, (g, c) => g === c);
        if (positions) {
          formLigature(collection, rule, positions);
          return 1;
        }
      }
      return null;
    }

    case "context":
    case "chainedContext":
      return applyContext(subtable.context, collection, env.filter, index, env.applyNested);

    case "reverseChainedSingle": {
      const coverageIndex = coverageIndexOf(subtable.coverage, glyphId);
      if (coverageIndex < 0) return null;
      const substitute = subtable.substitutes[coverageIndex];
      if (substitute === undefined) return null;

      let pos = index;
      for (const coverage of subtable.backtrackCoverages) {
        pos = prevIndex(collection, env.filter, pos);
        const g = pos < 0 ? 0 : collection.glyphIdAt(pos);
        if (g === 0 || coverageIndexOf(coverage, g) < 0) return null;
      }
      pos = index;
      for (const coverage of subtable.lookaheadCoverages) {
        pos = nextIndex(collection, env.filter, pos);
        const g = pos < 0 ? 0 : collection.glyphIdAt(pos);
        if (g === 0 || coverageIndexOf(coverage, g) < 0) return null;
      }

      collection.setGlyphId(index, substitute);
      return 1;
    }
  }
}

/**
 * Collapses the matched components into the first slot. Glyphs the lookup
 * skipped between components stay, tagged with the component they follow.
 */
function formLigature(collection: GlyphSubstitutionCollection, rule: LigatureRule, positions: number[]): void {
  const first = positions[0];
  collection.setGlyphId(first, rule.ligatureGlyph);
  const ligatureId = collection.markLigature(first, positions.length);

  for (let k = 1; k < positions.length; k++) {
    for (let j = positions[k - 1] + 1; j < positions[k]; j++) {
      collection.setLigatureComponent(j, ligatureId, k);
    }
  }
  // Right to left so earlier positions stay valid.
  for (let k = positions.length - 1; k >= 1; k--) collection.removeAt(positions[k]);
}
