/**
 * Walks a glyph buffer applying lookups.
 *
 * The buffer is walked left to right. At each slot the lookups whose
 * features the slot carries are tried in LookupList index order, whatever
 * order their features were listed in; the first subtable that matches
 * wins and the walk resumes past the slots it produced. Reverse chained
 * substitution lookups make their own right-to-left pass, in index order
 * among the others.
 * Nested lookups from contextual rules go through the same path with a
 * depth counter, since fonts can reference lookups in cycles.
 */

import type { Tag } from "../../types/layout.types";
import type { GlyphPositioningCollection } from "../collections/GlyphPositioningCollection";
import type { GlyphSubstitutionCollection } from "../collections/GlyphSubstitutionCollection";
import { layoutLogger } from "../logger";
import { InvalidFontFileError } from "../parsers/FontErrors";
import type { GDefTable } from "../parsers/tables/gdef";
import type { GPosSubTable } from "../parsers/tables/gposSubtables";
import type { GSubSubTable } from "../parsers/tables/gsubSubtables";
import type { Lookup, LookupList } from "../parsers/tables/lookupList";
import type { ResolvedFeature } from "../parsers/tables/scriptList";
import { applyPositioning } from "./applyPositioning";
import { applySubstitution } from "./applySubstitution";
import { GlyphFilter } from "./GlyphFilter";

export const DEFAULT_MAX_NESTING_DEPTH = 32;

export interface LookupProcessorOptions {
  maxNestingDepth?: number;
  /** Alternate index per feature for alternate substitution (default 0) */
  alternates?: Readonly<Record<Tag, number>>;
}

interface FeatureBuffer {
  readonly length: number;
  glyphIdAt(index: number): number;
  hasFeature(index: number, tag: Tag): boolean;
}

interface ActiveLookup<TSub> {
  lookup: Lookup<TSub>;
  featureTags: readonly Tag[];
  filter: GlyphFilter;
}

/** The first of the lookup's features the slot carries, unless the lookup's flags skip its glyph. */
function featureAt<TSub>(collection: FeatureBuffer, active: ActiveLookup<TSub>, index: number): Tag | undefined {
  if (active.filter.shouldSkip(collection.glyphIdAt(index))) return undefined;
  return active.featureTags.find((t) => collection.hasFeature(index, t));
}

abstract class LookupProcessor<TSub, TCollection extends FeatureBuffer> {
  protected readonly maxNestingDepth: number;

  constructor(
    protected readonly lookupList: LookupList<TSub>,
    protected readonly gdef: GDefTable | undefined,
    options: LookupProcessorOptions = {}
  ) {
    this.maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  }

  /**
   * Applies subtable `subtable` of `lookup` at `index`: slots to step past,
   * or null when it does not apply.
   */
  protected abstract applySubTable(
    subtable: TSub,
    collection: TCollection,
    filter: GlyphFilter,
    index: number,
    feature: Tag,
    depth: number
  ): number | null;

  protected isReverse(_lookup: Lookup<TSub>): boolean {
    return false;
  }

  /**
   * Applies every lookup the features name.
   */
  applyFeatures(collection: TCollection, features: readonly ResolvedFeature[]): void {
    const tagsByLookup = new Map<number, Tag[]>();
    for (const feature of features) {
      for (const lookupIndex of feature.lookupIndices) {
        const tags = tagsByLookup.get(lookupIndex) ?? [];
        if (!tags.includes(feature.featureTag)) tags.push(feature.featureTag);
        tagsByLookup.set(lookupIndex, tags);
      }
    }

    let forward: ActiveLookup<TSub>[] = [];
    for (const lookupIndex of [...tagsByLookup.keys()].sort((a, b) => a - b)) {
      const active = this.activate(lookupIndex, tagsByLookup.get(lookupIndex) ?? []);
      if (this.isReverse(active.lookup)) {
        this.walkSlots(collection, forward);
        forward = [];
        this.walkReverse(collection, active);
      } else {
        forward.push(active);
      }
    }
    this.walkSlots(collection, forward);
  }

  private activate(lookupIndex: number, featureTags: readonly Tag[]): ActiveLookup<TSub> {
    const lookup = this.lookupAt(lookupIndex);
    return { lookup, featureTags, filter: new GlyphFilter(this.gdef, lookup.lookupFlag, lookup.markFilteringSet) };
  }

  private walkSlots(collection: TCollection, lookups: readonly ActiveLookup<TSub>[]): void {
    if (lookups.length === 0) return;
    let i = 0;
    while (i < collection.length) {
      let advance: number | null = null;
      for (const active of lookups) {
        const feature = featureAt(collection, active, i);
        if (feature === undefined) continue;
        advance = this.trySubTables(active.lookup, collection, active.filter, i, feature, 0);
        if (advance !== null) break;
      }
      i += advance ?? 1;
    }
  }

  private walkReverse(collection: TCollection, active: ActiveLookup<TSub>): void {
    for (let i = collection.length - 1; i >= 0; i--) {
      const feature = featureAt(collection, active, i);
      if (feature === undefined) continue;
      this.trySubTables(active.lookup, collection, active.filter, i, feature, 0);
    }
  }

  protected trySubTables(
    lookup: Lookup<TSub>,
    collection: TCollection,
    filter: GlyphFilter,
    index: number,
    feature: Tag,
    depth: number
  ): number | null {
    for (const subtable of lookup.subtables) {
      const advance = this.applySubTable(subtable, collection, filter, index, feature, depth);
      if (advance !== null) return advance;
    }
    return null;
  }

  /**
   * Applies lookup `lookupIndex` at a single position on behalf of a
   * contextual rule. `depth` is the nesting level of the nested lookup.
   */
  protected applyNested(
    collection: TCollection,
    lookupIndex: number,
    index: number,
    feature: Tag,
    depth: number
  ): boolean {
    if (depth > this.maxNestingDepth) {
      layoutLogger.error("LookupProcessor", "nestingDepthExceeded", { lookupIndex, depth });
      throw new InvalidFontFileError(
        `Nested lookup ${lookupIndex} exceeds the maximum nesting depth of ${this.maxNestingDepth}`,
        { field: "lookupListIndex", value: lookupIndex }
      );
    }
    if (index < 0 || index >= collection.length) return false;

    const lookup = this.lookupAt(lookupIndex);
    const filter = new GlyphFilter(this.gdef, lookup.lookupFlag, lookup.markFilteringSet);
    if (filter.shouldSkip(collection.glyphIdAt(index))) return false;
    return this.trySubTables(lookup, collection, filter, index, feature, depth) !== null;
  }

  private lookupAt(lookupIndex: number): Lookup<TSub> {
    const lookup = this.lookupList.lookups[lookupIndex];
    if (!lookup) {
      throw new InvalidFontFileError(
        `Lookup ${lookupIndex} is outside the LookupList (${this.lookupList.lookups.length} lookups)`,
        { field: "lookupListIndex", value: lookupIndex }
      );
    }
    return lookup;
  }
}

export class SubstitutionProcessor extends LookupProcessor<GSubSubTable, GlyphSubstitutionCollection> {
  private readonly alternates: Readonly<Record<Tag, number>>;

  constructor(lookupList: LookupList<GSubSubTable>, gdef?: GDefTable, options: LookupProcessorOptions = {}) {
    super(lookupList, gdef, options);
    this.alternates = options.alternates ?? {};
  }

  protected override isReverse(lookup: Lookup<GSubSubTable>): boolean {
    return lookup.lookupType === 8;
  }

  protected applySubTable(
    subtable: GSubSubTable,
    collection: GlyphSubstitutionCollection,
    filter: GlyphFilter,
    index: number,
    feature: Tag,
    depth: number
  ): number | null {
    return applySubstitution(
      subtable,
      {
        collection,
        filter,
        feature,
        alternates: this.alternates,
        applyNested: (lookupIndex, position) =>
          this.applyNested(collection, lookupIndex, position, feature, depth + 1),
      },
      index
    );
  }
}

export class PositioningProcessor extends LookupProcessor<GPosSubTable, GlyphPositioningCollection> {
  protected applySubTable(
    subtable: GPosSubTable,
    collection: GlyphPositioningCollection,
    filter: GlyphFilter,
    index: number,
    feature: Tag,
    depth: number
  ): number | null {
    return applyPositioning(
      subtable,
      {
        collection,
        filter,
        gdef: this.gdef,
        applyNested: (lookupIndex, position) =>
          this.applyNested(collection, lookupIndex, position, feature, depth + 1),
      },
      index
    );
  }
}
