/**
 * Base class for script shapers: decides which feature tags each slot carries
 * before lookups run.
 */

import type { Tag } from "../../types/layout.types";
import type { GlyphSubstitutionCollection } from "../collections/GlyphSubstitutionCollection";
import type { FeatureSettings } from "../config/shapingOptions";

export abstract class BaseShaper {
  abstract readonly name: string;

  /** Features this shaper turns on before request overrides */
  protected abstract readonly defaultFeatures: readonly Tag[];

  constructor(protected readonly settings: FeatureSettings) {}

  /**
   * Features every slot carries: the shaper defaults plus the request's
   * enabled features, minus the ones it disabled.
   */
  get enabledFeatures(): Set<Tag> {
    const features = new Set<Tag>(this.defaultFeatures);
    for (const tag of this.settings.enabled) features.add(tag);
    for (const tag of this.settings.disabled) features.delete(tag);
    return features;
  }

  /**
   * Tags slots `index` .. `index + count - 1` with their features.
   */
  assignFeatures(collection: GlyphSubstitutionCollection, index = 0, count = collection.length - index): void {
    const end = Math.min(collection.length, index + count);
    const features = this.enabledFeatures;
    for (let i = Math.max(0, index); i < end; i++) {
      for (const tag of features) collection.addFeature(i, tag);
    }
  }
}
