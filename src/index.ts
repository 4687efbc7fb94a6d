export type { FontMetricsProvider, GlyphId, LogEntry, LogLevel, Point, Tag } from "./types/layout.types";
export { ValidationMode } from "./types/layout.types";

export { layoutLogger } from "./engine/logger";
export { loadLayoutFont, loadLayoutFontFile, type LoadedLayoutFont } from "./engine/FontLoader";
export { type LayoutFont, ShapingPipeline } from "./engine/ShapingPipeline";

export {
  type FeatureSettings,
  parseShapingOptions,
  resolveFeatureSettings,
  type ShapingOptions,
  type ShapingOptionsInput,
  shapingOptionsSchema,
} from "./engine/config/shapingOptions";
export { ShapingOptionsError, validateWithMode } from "./engine/config/validation";

export {
  GlyphSubstitutionCollection,
  type GlyphSequence,
  type SubstitutionSlot,
} from "./engine/collections/GlyphSubstitutionCollection";
export {
  GlyphPositioningCollection,
  type PositionAdjustment,
  type PositioningSlot,
} from "./engine/collections/GlyphPositioningCollection";

export { BigEndianBinaryReader } from "./engine/parsers/BigEndianBinaryReader";
export { FontFormatError, InvalidFontFileError, MalformedFontError } from "./engine/parsers/FontErrors";
export { detectFormat, readTableDirectory, type TableDirectory, type TableRecord } from "./engine/parsers/TableDirectory";
export { type GDefTable, GlyphClass, loadGDefTable } from "./engine/parsers/tables/gdef";
export { type GPosTable, type GSubTable, type LayoutTable, loadGPosTable, loadGSubTable } from "./engine/parsers/tables/layout";
export { type ResolvedFeature, resolveFeatures } from "./engine/parsers/tables/scriptList";
export { LookupFlag } from "./engine/parsers/tables/lookupList";

export {
  DEFAULT_MAX_NESTING_DEPTH,
  PositioningProcessor,
  SubstitutionProcessor,
} from "./engine/shaping/LookupProcessor";
export { ArabicShaper, BaseShaper, DefaultShaper, shaperForScript } from "./engine/shapers";
