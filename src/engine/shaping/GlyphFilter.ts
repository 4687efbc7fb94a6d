/**
 * Lookup flag filtering: which glyphs a lookup steps over while matching.
 * Without a GDEF table nothing is skipped.
 */

import type { GlyphId } from "../../types/layout.types";
import {
  type GDefTable,
  GlyphClass,
  glyphClassOf,
  isInMarkGlyphSet,
  markAttachClassOf,
} from "../parsers/tables/gdef";
import { LookupFlag } from "../parsers/tables/lookupList";

export class GlyphFilter {
  constructor(
    private readonly gdef: GDefTable | undefined,
    private readonly lookupFlag: number,
    private readonly markFilteringSet?: number
  ) {}

  shouldSkip(glyphId: GlyphId): boolean {
    if (!this.gdef) return false;
    const glyphClass = glyphClassOf(this.gdef, glyphId);
    const flag = this.lookupFlag;

    switch (glyphClass) {
      case GlyphClass.BASE:
        return (flag & LookupFlag.IGNORE_BASE_GLYPHS) !== 0;
      case GlyphClass.LIGATURE:
        return (flag & LookupFlag.IGNORE_LIGATURES) !== 0;
      case GlyphClass.MARK: {
        if (flag & LookupFlag.IGNORE_MARKS) return true;
        if (flag & LookupFlag.USE_MARK_FILTERING_SET && this.markFilteringSet !== undefined) {
          return !isInMarkGlyphSet(this.gdef, this.markFilteringSet, glyphId);
        }
        const attachType = (flag & LookupFlag.MARK_ATTACHMENT_TYPE_MASK) >> 8;
        return attachType !== 0 && markAttachClassOf(this.gdef, glyphId) !== attachType;
      }
      default:
        return false;
    }
  }
}

export function isMarkGlyph(gdef: GDefTable | undefined, glyphId: GlyphId): boolean {
  return gdef !== undefined && glyphClassOf(gdef, glyphId) === GlyphClass.MARK;
}
