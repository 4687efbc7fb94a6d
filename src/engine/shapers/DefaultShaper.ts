import type { Tag } from "../../types/layout.types";
import { BaseShaper } from "./BaseShaper";

export const DEFAULT_FEATURES: readonly Tag[] = [
  "ccmp",
  "locl",
  "rlig",
  "liga",
  "clig",
  "calt",
  "rclt",
  "kern",
  "mark",
  "mkmk",
  "curs",
  "dist",
  "abvm",
  "blwm",
];

/**
 * Latin and other scripts without contextual joining.
 */
export class DefaultShaper extends BaseShaper {
  readonly name = "default";
  protected readonly defaultFeatures = DEFAULT_FEATURES;
}
