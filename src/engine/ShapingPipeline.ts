/**
 * Shaping pipeline: feature assignment, GSUB, metrics, GPOS.
 *
 * The font's tables are read-only here and may be shared between pipelines;
 * each call owns the collection it is given.
 */

import type { FontMetricsProvider, Tag } from "../types/layout.types";
import { ValidationMode } from "../types/layout.types";
import { GlyphPositioningCollection } from "./collections/GlyphPositioningCollection";
import type { GlyphSubstitutionCollection } from "./collections/GlyphSubstitutionCollection";
import { parseShapingOptions, resolveFeatureSettings, type ShapingOptions } from "./config/shapingOptions";
import { layoutLogger } from "./logger";
import type { GDefTable } from "./parsers/tables/gdef";
import type { GPosTable, GSubTable, LayoutTable } from "./parsers/tables/layout";
import { type ResolvedFeature, resolveFeatures } from "./parsers/tables/scriptList";
import {
  type LookupProcessorOptions,
  PositioningProcessor,
  SubstitutionProcessor,
} from "./shaping/LookupProcessor";
import { shaperForScript } from "./shapers";

/**
 * Everything shaping needs from a loaded font.
 */
export interface LayoutFont {
  metrics: FontMetricsProvider;
  gsub?: GSubTable;
  gpos?: GPosTable;
  gdef?: GDefTable;
}

export class ShapingPipeline {
  constructor(private readonly font: LayoutFont) {}

  /**
   * Shapes `collection` in place through GSUB and returns its positioned
   * form. `rawOptions` is validated in `mode`.
   */
  shape(
    collection: GlyphSubstitutionCollection,
    rawOptions: unknown = {},
    mode: ValidationMode = ValidationMode.LENIENT
  ): GlyphPositioningCollection {
    const startTime = Date.now();
    const options = parseShapingOptions(rawOptions, mode);
    const settings = resolveFeatureSettings(options);

    const shaper = shaperForScript(options.script, settings);
    shaper.assignFeatures(collection);

    const gsubFeatures = this.featuresFor(this.font.gsub, options);
    const gposFeatures = this.featuresFor(this.font.gpos, options);
    this.warnUnsupported(settings.enabled, [...gsubFeatures, ...gposFeatures]);

    for (const feature of [...gsubFeatures, ...gposFeatures]) {
      if (!feature.required) continue;
      for (let i = 0; i < collection.length; i++) collection.addFeature(i, feature.featureTag);
    }

    const { maxNestingDepth } = options;
    this.substitute(collection, gsubFeatures, { maxNestingDepth, alternates: settings.alternates });
    const positioned = GlyphPositioningCollection.fromSubstitution(collection, this.font.metrics);
    this.position(positioned, gposFeatures, { maxNestingDepth });

    layoutLogger.timed("debug", "ShapingPipeline", "shape", startTime, {
      shaper: shaper.name,
      script: options.script,
      language: options.language,
      glyphs: positioned.length,
    });
    return positioned;
  }

  substitute(
    collection: GlyphSubstitutionCollection,
    features: readonly ResolvedFeature[],
    options: LookupProcessorOptions = {}
  ): void {
    const gsub = this.font.gsub;
    if (!gsub || features.length === 0) return;
    new SubstitutionProcessor(gsub.lookupList, this.font.gdef, options).applyFeatures(collection, features);
  }

  position(
    collection: GlyphPositioningCollection,
    features: readonly ResolvedFeature[],
    options: LookupProcessorOptions = {}
  ): void {
    const gpos = this.font.gpos;
    if (!gpos || features.length === 0) return;
    new PositioningProcessor(gpos.lookupList, this.font.gdef, options).applyFeatures(collection, features);
  }

  private featuresFor<T>(table: LayoutTable<T> | undefined, options: ShapingOptions): ResolvedFeature[] {
    if (!table) return [];
    return resolveFeatures(table.scriptList, table.featureList, options.script, options.language);
  }

  private warnUnsupported(requested: ReadonlySet<Tag>, available: readonly ResolvedFeature[]): void {
    const present = new Set(available.map((f) => f.featureTag));
    for (const tag of requested) {
      if (!present.has(tag)) {
        layoutLogger.warn("ShapingPipeline", "featureNotInFont", { feature: tag });
      }
    }
  }
}
