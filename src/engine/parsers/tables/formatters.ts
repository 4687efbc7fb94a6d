/**
 * Shared tag helpers for layout table parsing.
 */

export function tag4(b0: number, b1: number, b2: number, b3: number): string {
  return String.fromCharCode(b0, b1, b2, b3);
}

/**
 * Pads short tags with spaces ("ur" -> "ur  ") the way tags are stored in fonts.
 */
export function normalizeTag(tag: string): string {
  return tag.length >= 4 ? tag.slice(0, 4) : tag.padEnd(4, " ");
}

export const GSUB_LOOKUP_TYPES: Record<number, string> = {
  1: "Single Substitution",
  2: "Multiple Substitution",
  3: "Alternate Substitution",
  4: "Ligature Substitution",
  5: "Contextual Substitution",
  6: "Chaining Contextual Substitution",
  7: "Extension Substitution",
  8: "Reverse Chaining Contextual Single Substitution",
};

export const GPOS_LOOKUP_TYPES: Record<number, string> = {
  1: "Single Adjustment",
  2: "Pair Adjustment",
  3: "Cursive Attachment",
  4: "MarkToBase Attachment",
  5: "MarkToLigature Attachment",
  6: "MarkToMark Attachment",
  7: "Contextual Positioning",
  8: "Chaining Contextual Positioning",
  9: "Extension Positioning",
};
