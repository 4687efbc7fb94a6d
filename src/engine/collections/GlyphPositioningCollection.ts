/**
 * Per-slot advances and offsets accumulated by GPOS lookups.
 * Built from the final substitution buffer; the slot count never changes.
 * Values are font design units.
 */

import type { FontMetricsProvider, GlyphId, Point, Tag } from "../../types/layout.types";
import type { GlyphSequence, GlyphSubstitutionCollection } from "./GlyphSubstitutionCollection";

export interface PositioningSlot {
  glyphId: GlyphId;
  codePoint: number;
  cluster: number;
  features: ReadonlySet<Tag>;
  advance: Point;
  offset: Point;
  ligatureId: number;
  ligatureComponent: number;
  componentCount: number;
}

export interface PositionAdjustment {
  xPlacement: number;
  yPlacement: number;
  xAdvance: number;
  yAdvance: number;
}

export class GlyphPositioningCollection implements GlyphSequence {
  private readonly slots: PositioningSlot[];

  constructor(slots: PositioningSlot[]) {
    this.slots = slots;
  }

  static fromSubstitution(
    collection: GlyphSubstitutionCollection,
    metrics: FontMetricsProvider
  ): GlyphPositioningCollection {
    const slots: PositioningSlot[] = [];
    for (let i = 0; i < collection.length; i++) {
      const s = collection.slotAt(i);
      slots.push({
        glyphId: s.glyphId,
        codePoint: s.codePoint,
        cluster: s.cluster,
        features: new Set(s.features),
        advance: { x: metrics.advanceWidth(s.glyphId), y: 0 },
        offset: { x: 0, y: 0 },
        ligatureId: s.ligatureId,
        ligatureComponent: s.ligatureComponent,
        componentCount: s.componentCount,
      });
    }
    return new GlyphPositioningCollection(slots);
  }

  get length(): number {
    return this.slots.length;
  }

  slotAt(index: number): Readonly<PositioningSlot> {
    return this.slot(index);
  }

  glyphIdAt(index: number): GlyphId {
    return this.slot(index).glyphId;
  }

  hasFeature(index: number, tag: Tag): boolean {
    return this.slot(index).features.has(tag);
  }

  advanceAt(index: number): Readonly<Point> {
    return this.slot(index).advance;
  }

  offsetAt(index: number): Readonly<Point> {
    return this.slot(index).offset;
  }

  /** Adds a ValueRecord-style adjustment to what is already there. */
  adjust(index: number, value: PositionAdjustment): void {
    const s = this.slot(index);
    s.offset.x += value.xPlacement;
    s.offset.y += value.yPlacement;
    s.advance.x += value.xAdvance;
    s.advance.y += value.yAdvance;
  }

  setOffset(index: number, x: number, y: number): void {
    const s = this.slot(index);
    s.offset.x = x;
    s.offset.y = y;
  }

  setAdvance(index: number, x: number, y = this.slot(index).advance.y): void {
    const s = this.slot(index);
    s.advance.x = x;
    s.advance.y = y;
  }

  glyphIds(): GlyphId[] {
    return this.slots.map((s) => s.glyphId);
  }

  private slot(index: number): PositioningSlot {
    const s = this.slots[index];
    if (!s) {
      throw new RangeError(`Slot ${index} is outside the collection (length ${this.slots.length})`);
    }
    return s;
  }
}
