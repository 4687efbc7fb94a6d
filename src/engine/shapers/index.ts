import type { Tag } from "../../types/layout.types";
import type { FeatureSettings } from "../config/shapingOptions";
import { normalizeTag } from "../parsers/tables/formatters";
import { ArabicShaper } from "./ArabicShaper";
import type { BaseShaper } from "./BaseShaper";
import { DefaultShaper } from "./DefaultShaper";

export { ArabicShaper, joiningForms, joiningTypeOf, POSITIONAL_FEATURES } from "./ArabicShaper";
export type { JoiningType } from "./ArabicShaper";
export { BaseShaper } from "./BaseShaper";
export { DEFAULT_FEATURES, DefaultShaper } from "./DefaultShaper";

const EMPTY_SETTINGS: FeatureSettings = { enabled: new Set(), disabled: new Set(), alternates: {} };

/**
 * Shaper for an OpenType script tag ("arab" -> Arabic joining, anything else
 * -> default).
 */
export function shaperForScript(script: Tag, settings: FeatureSettings = EMPTY_SETTINGS): BaseShaper {
  switch (normalizeTag(script)) {
    case "arab":
      return new ArabicShaper(settings);
    default:
      return new DefaultShaper(settings);
  }
}
