/**
 * Mutable glyph buffer rewritten in place by GSUB lookups.
 * Slot indices shift under replaceRange/removeAt; callers re-read positions
 * after every substitution instead of holding on to them.
 */

import type { GlyphId, Tag } from "../../types/layout.types";

export interface SubstitutionSlot {
  glyphId: GlyphId;
  /** Source code point, or -1 for glyphs with none */
  codePoint: number;
  /** Index of the source character the slot came from */
  cluster: number;
  features: Set<Tag>;
  /** Non-zero when the slot is a ligature or a mark inside one */
  ligatureId: number;
  /** 1-based component a mark sits on inside its ligature; 0 when unset */
  ligatureComponent: number;
  /** Components the glyph stands for (1 unless it is a ligature) */
  componentCount: number;
}

/** Read-only view shared by both collections for rule matching. */
export interface GlyphSequence {
  readonly length: number;
  glyphIdAt(index: number): GlyphId;
}

export class GlyphSubstitutionCollection implements GlyphSequence {
  private slots: SubstitutionSlot[] = [];
  private nextLigatureId = 1;

  static fromGlyphIds(glyphIds: readonly GlyphId[], codePoints?: readonly number[]): GlyphSubstitutionCollection {
    const collection = new GlyphSubstitutionCollection();
    glyphIds.forEach((g, i) => collection.add(g, codePoints?.[i] ?? -1, i));
    return collection;
  }

  add(glyphId: GlyphId, codePoint = -1, cluster = this.slots.length): void {
    this.slots.push({
      glyphId,
      codePoint,
      cluster,
      features: new Set(),
      ligatureId: 0,
      ligatureComponent: 0,
      componentCount: 1,
    });
  }

  get length(): number {
    return this.slots.length;
  }

  slotAt(index: number): Readonly<SubstitutionSlot> {
    return this.slot(index);
  }

  glyphIdAt(index: number): GlyphId {
    return this.slot(index).glyphId;
  }

  setGlyphId(index: number, glyphId: GlyphId): void {
    this.slot(index).glyphId = glyphId;
  }

  codePointAt(index: number): number {
    return this.slot(index).codePoint;
  }

  featuresAt(index: number): ReadonlySet<Tag> {
    return this.slot(index).features;
  }

  hasFeature(index: number, tag: Tag): boolean {
    return this.slot(index).features.has(tag);
  }

  addFeature(index: number, tag: Tag): void {
    this.slot(index).features.add(tag);
  }

  removeFeature(index: number, tag: Tag): void {
    this.slot(index).features.delete(tag);
  }

  /**
   * Replaces slots [start, start + deleteCount) with one slot per glyph id.
   * New slots copy code point, cluster, features and ligature data from the
   * first replaced slot.
   */
  replaceRange(start: number, deleteCount: number, glyphIds: readonly GlyphId[]): void {
    if (start < 0 || deleteCount < 0 || start + deleteCount > this.slots.length) {
      throw new RangeError(
        `Range [${start}, ${start + deleteCount}) is outside the collection (length ${this.slots.length})`
      );
    }
    const template: SubstitutionSlot | undefined = this.slots[start] ?? this.slots[start - 1];
    const inserted = glyphIds.map(
      (glyphId): SubstitutionSlot => ({
        glyphId,
        codePoint: template?.codePoint ?? -1,
        cluster: template?.cluster ?? start,
        features: new Set(template?.features ?? []),
        ligatureId: template?.ligatureId ?? 0,
        ligatureComponent: template?.ligatureComponent ?? 0,
        componentCount: 1,
      })
    );
    this.slots.splice(start, deleteCount, ...inserted);
  }

  removeAt(index: number): void {
    this.replaceRange(index, 1, []);
  }

  /**
   * Marks `index` as a ligature standing for `componentCount` components and
   * returns the id shared by the ligature and the marks inside it.
   */
  markLigature(index: number, componentCount: number): number {
    const ligatureId = this.nextLigatureId++;
    const s = this.slot(index);
    s.ligatureId = ligatureId;
    s.ligatureComponent = 0;
    s.componentCount = componentCount;
    return ligatureId;
  }

  setLigatureComponent(index: number, ligatureId: number, component: number): void {
    const s = this.slot(index);
    s.ligatureId = ligatureId;
    s.ligatureComponent = component;
  }

  glyphIds(): GlyphId[] {
    return this.slots.map((s) => s.glyphId);
  }

  private slot(index: number): SubstitutionSlot {
    const s = this.slots[index];
    if (!s) {
      throw new RangeError(`Slot ${index} is outside the collection (length ${this.slots.length})`);
    }
    return s;
  }
}
