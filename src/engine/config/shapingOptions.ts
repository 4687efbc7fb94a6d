/**
 * Shaping request options.
 *
 * Feature values follow the usual feature-setting convention: `true`/`false`
 * switch a feature on or off, a number N > 0 switches it on and selects
 * alternate N - 1 for alternate substitution, 0 switches it off.
 */

import { z } from "zod";
import type { Tag } from "../../types/layout.types";
import { ValidationMode } from "../../types/layout.types";
import { DEFAULT_MAX_NESTING_DEPTH } from "../shaping/LookupProcessor";
import { normalizeTag } from "../parsers/tables/formatters";
import { validateWithMode } from "./validation";

const TAG_PATTERN = /^[\x20-\x7e]{1,4}$/;

const tagSchema = z
  .string()
  .regex(TAG_PATTERN, { message: "Tags are 1 to 4 printable ASCII characters" })
  .transform(normalizeTag);

const featureValueSchema = z.union([z.boolean(), z.number().int().nonnegative()]);

export const shapingOptionsSchema = z.object({
  script: tagSchema.default("DFLT"),
  language: tagSchema.default("dflt"),
  features: z.record(z.string().regex(TAG_PATTERN), featureValueSchema).default({}),
  alternates: z.record(z.string().regex(TAG_PATTERN), z.number().int().nonnegative()).default({}),
  maxNestingDepth: z.number().int().min(1).max(256).default(DEFAULT_MAX_NESTING_DEPTH),
});

export type ShapingOptionsInput = z.input<typeof shapingOptionsSchema>;
export type ShapingOptions = z.output<typeof shapingOptionsSchema>;

/**
 * Features switched on or off by the request, and the alternate index chosen
 * per feature.
 */
export interface FeatureSettings {
  enabled: Set<Tag>;
  disabled: Set<Tag>;
  alternates: Record<Tag, number>;
}

export function parseShapingOptions(
  raw: unknown = {},
  mode: ValidationMode = ValidationMode.LENIENT
): ShapingOptions {
  return validateWithMode(shapingOptionsSchema, raw, mode).data;
}

export function resolveFeatureSettings(options: ShapingOptions): FeatureSettings {
  const enabled = new Set<Tag>();
  const disabled = new Set<Tag>();
  const alternates: Record<Tag, number> = {};

  for (const [rawTag, index] of Object.entries(options.alternates)) {
    alternates[normalizeTag(rawTag)] = index;
  }

  for (const [rawTag, value] of Object.entries(options.features)) {
    const tag = normalizeTag(rawTag);
    if (value === false || value === 0) {
      disabled.add(tag);
      enabled.delete(tag);
      continue;
    }
    enabled.add(tag);
    disabled.delete(tag);
    if (typeof value === "number") alternates[tag] ??= value - 1;
  }

  return { enabled, disabled, alternates };
}
