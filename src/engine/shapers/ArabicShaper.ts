/**
 * Arabic joining: each letter gets exactly one of isol/init/medi/fina from
 * its joining type and its neighbours; transparent marks are stepped over.
 */

import { z } from "zod";
import type { Tag } from "../../types/layout.types";
import type { GlyphSubstitutionCollection } from "../collections/GlyphSubstitutionCollection";
import { BaseShaper } from "./BaseShaper";
import joiningData from "./data/arabic-joining.json";
import { DEFAULT_FEATURES } from "./DefaultShaper";

/** R right-joining, D dual, C join-causing, U non-joining, T transparent, L left-joining */
export type JoiningType = "R" | "D" | "C" | "U" | "T" | "L";

const joiningTableSchema = z.object({
  ranges: z.array(
    z.object({
      start: z.string().regex(/^[0-9A-F]{4,6}$/),
      end: z.string().regex(/^[0-9A-F]{4,6}$/),
      type: z.enum(["R", "D", "C", "U", "T", "L"]),
    })
  ),
});

const JOINING_RANGES = joiningTableSchema.parse(joiningData).ranges.map((r) => ({
  start: parseInt(r.start, 16),
  end: parseInt(r.end, 16),
  type: r.type,
}));

export const POSITIONAL_FEATURES: readonly Tag[] = ["isol", "init", "medi", "fina"];

export function joiningTypeOf(codePoint: number): JoiningType {
  let lo = 0;
  let hi = JOINING_RANGES.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const range = JOINING_RANGES[mid];
    if (codePoint < range.start) hi = mid - 1;
    else if (codePoint > range.end) lo = mid + 1;
    else return range.type;
  }
  return "U";
}

const joinsToNext = (t: JoiningType | undefined) => t === "D" || t === "L" || t === "C";
const joinsToPrevious = (t: JoiningType | undefined) => t === "D" || t === "R" || t === "C";

/**
 * Positional form for every slot (undefined for transparent and
 * non-joining slots).
 */
export function joiningForms(types: readonly JoiningType[]): Array<Tag | undefined> {
  const forms = new Array<Tag | undefined>(types.length).fill(undefined);
  const letters: number[] = [];
  types.forEach((t, i) => {
    if (t !== "T") letters.push(i);
  });

  letters.forEach((slot, k) => {
    const type = types[slot];
    if (type === "U") return;
    const previous = k > 0 ? types[letters[k - 1]] : undefined;
    const next = k + 1 < letters.length ? types[letters[k + 1]] : undefined;

    const joinsBefore = joinsToPrevious(type) && joinsToNext(previous);
    const joinsAfter = joinsToNext(type) && joinsToPrevious(next);
    forms[slot] = joinsBefore ? (joinsAfter ? "medi" : "fina") : joinsAfter ? "init" : "isol";
  });

  return forms;
}

export class ArabicShaper extends BaseShaper {
  readonly name = "arabic";
  protected readonly defaultFeatures: readonly Tag[] = [...DEFAULT_FEATURES, ...POSITIONAL_FEATURES, "mset"];

  override assignFeatures(
    collection: GlyphSubstitutionCollection,
    index = 0,
    count = collection.length - index
  ): void {
    const start = Math.max(0, index);
    const end = Math.min(collection.length, index + count);
    const enabled = this.enabledFeatures;
    const common = [...enabled].filter((tag) => !POSITIONAL_FEATURES.includes(tag));

    const types: JoiningType[] = [];
    for (let i = start; i < end; i++) {
      const codePoint = collection.codePointAt(i);
      types.push(codePoint < 0 ? "U" : joiningTypeOf(codePoint));
    }
    const forms = joiningForms(types);

    for (let i = start; i < end; i++) {
      for (const tag of common) collection.addFeature(i, tag);
      const form = forms[i - start];
      if (form !== undefined && enabled.has(form)) collection.addFeature(i, form);
    }
  }
}
