/**
 * Backtrack / input / lookahead matching shared by every contextual format,
 * and application of a matched rule's lookup records.
 *
 * Matching only reads the sequence. Glyph 0 or a position past either end
 * fails the whole rule.
 */

import type { GlyphId } from "../../types/layout.types";
import type { GlyphSequence } from "../collections/GlyphSubstitutionCollection";
import { classOf } from "../parsers/tables/classDef";
import { type CoverageTable, coverageIndexOf } from "../parsers/tables/coverage";
import type { SequenceContext, SequenceLookupRecord } from "../parsers/tables/sequenceContext";
import type { GlyphFilter } from "./GlyphFilter";

type Matcher<T> = (glyphId: GlyphId, value: T) => boolean;

/** Applies one nested lookup at a position; true when it changed something. */
export type NestedLookupApplier = (lookupListIndex: number, position: number) => boolean;

export interface ContextMatch {
  /** Buffer positions of the input glyphs, first glyph included */
  positions: number[];
  lookupRecords: readonly SequenceLookupRecord[];
}

export function nextIndex(sequence: GlyphSequence, filter: GlyphFilter, from: number): number {
  for (let i = from + 1; i < sequence.length; i++) {
    if (!filter.shouldSkip(sequence.glyphIdAt(i))) return i;
  }
  return -1;
}

export function prevIndex(sequence: GlyphSequence, filter: GlyphFilter, from: number): number {
  for (let i = from - 1; i >= 0; i--) {
    if (!filter.shouldSkip(sequence.glyphIdAt(i))) return i;
  }
  return -1;
}

/**
 * Matches `rest` left to right after the glyph at `index`; returns the input
 * positions (starting with `index`) or null.
 */
export function matchInput<T>(
  sequence: GlyphSequence,
  filter: GlyphFilter,
  index: number,
  rest: readonly T[],
  matches: Matcher<T>
): number[] | null {
  const positions = [index];
  let pos = index;
  for (const value of rest) {
    pos = nextIndex(sequence, filter, pos);
    if (pos < 0) return null;
    const g = sequence.glyphIdAt(pos);
    if (g === 0 || !matches(g, value)) return null;
    positions.push(pos);
  }
  return positions;
}

/** Matches `values` (nearest first) right to left before `index`. */
export function matchBacktrack<T>(
  sequence: GlyphSequence,
  filter: GlyphFilter,
  index: number,
  values: readonly T[],
  matches: Matcher<T>
): boolean {
  let pos = index;
  for (const value of values) {
    pos = prevIndex(sequence, filter, pos);
    if (pos < 0) return false;
    const g = sequence.glyphIdAt(pos);
    if (g === 0 || !matches(g, value)) return false;
  }
  return true;
}

/** Matches `values` left to right after the last input position. */
export function matchLookahead<T>(
  sequence: GlyphSequence,
  filter: GlyphFilter,
  lastInput: number,
  values: readonly T[],
  matches: Matcher<T>
): boolean {
  let pos = lastInput;
  for (const value of values) {
    pos = nextIndex(sequence, filter, pos);
    if (pos < 0) return false;
    const g = sequence.glyphIdAt(pos);
    if (g === 0 || !matches(g, value)) return false;
  }
  return true;
}

const sameGlyph: Matcher<number> = (g, value) => g === value;
const covered: Matcher<CoverageTable> = (g, coverage) => coverageIndexOf(coverage, g) >= 0;

/**
 * Finds the first rule of `context` that matches at `index`.
 */
export function matchContext(
  context: SequenceContext,
  sequence: GlyphSequence,
  filter: GlyphFilter,
  index: number
): ContextMatch | null {
  if (index < 0 || index >= sequence.length) return null;
  const glyphId = sequence.glyphIdAt(index);
  if (glyphId === 0) return null;

  switch (context.format) {
    case 1: {
      const coverageIndex = coverageIndexOf(context.coverage, glyphId);
      if (coverageIndex < 0) return null;
      for (const rule of context.ruleSets[coverageIndex] ?? []) {
        const positions = matchInput(sequence, filter, index, rule.input, sameGlyph);
        if (!positions) continue;
        if (!matchBacktrack(sequence, filter, index, rule.backtrack, sameGlyph)) continue;
        if (!matchLookahead(sequence, filter, positions[positions.length - 1], rule.lookahead, sameGlyph)) {
          continue;
        }
        return { positions, lookupRecords: rule.lookupRecords };
      }
      return null;
    }
    case 2: {
      if (coverageIndexOf(context.coverage, glyphId) < 0) return null;
      const { backtrackClassDef, inputClassDef, lookaheadClassDef } = context;
      const inputClass: Matcher<number> = (g, c) => classOf(inputClassDef, g) === c;
      const backtrackClass: Matcher<number> = (g, c) => classOf(backtrackClassDef, g) === c;
      const lookaheadClass: Matcher<number> = (g, c) => classOf(lookaheadClassDef, g) === c;

      for (const rule of context.ruleSets[classOf(inputClassDef, glyphId)] ?? []) {
        const positions = matchInput(sequence, filter, index, rule.input, inputClass);
        if (!positions) continue;
        if (!matchBacktrack(sequence, filter, index, rule.backtrack, backtrackClass)) continue;
        if (!matchLookahead(sequence, filter, positions[positions.length - 1], rule.lookahead, lookaheadClass)) {
          continue;
        }
        return { positions, lookupRecords: rule.lookupRecords };
      }
      return null;
    }
    case 3: {
      const [first, ...rest] = context.inputCoverages;
      if (!first || coverageIndexOf(first, glyphId) < 0) return null;
      const positions = matchInput(sequence, filter, index, rest, covered);
      if (!positions) return null;
      if (!matchBacktrack(sequence, filter, index, context.backtrackCoverages, covered)) return null;
      if (
        !matchLookahead(sequence, filter, positions[positions.length - 1], context.lookaheadCoverages, covered)
      ) {
        return null;
      }
      return { positions, lookupRecords: context.lookupRecords };
    }
  }
}

/**
 * Applies every lookup record of a match in order. Positions after a record
 * that grew or shrank the buffer are moved by the length change.
 * Returns whether anything changed and the last input position afterwards.
 */
export function applyLookupRecords(
  sequence: GlyphSequence,
  match: ContextMatch,
  applyNested: NestedLookupApplier
): { changed: boolean; lastPosition: number } {
  const positions = [...match.positions];
  let changed = false;

  for (const record of match.lookupRecords) {
    if (record.sequenceIndex >= positions.length) continue;
    const at = positions[record.sequenceIndex];
    if (at >= sequence.length) continue;

    const before = sequence.length;
    if (applyNested(record.lookupListIndex, at)) changed = true;
    const delta = sequence.length - before;

    if (delta !== 0) {
      for (let k = record.sequenceIndex + 1; k < positions.length; k++) {
        positions[k] = Math.max(at, positions[k] + delta);
      }
    }
  }

  return { changed, lastPosition: positions[positions.length - 1] };
}

/**
 * Matches and applies a contextual subtable at `index`. Returns the number of
 * slots to step past, or null when no rule matched or nothing changed.
 */
export function applyContext(
  context: SequenceContext,
  sequence: GlyphSequence,
  filter: GlyphFilter,
  index: number,
  applyNested: NestedLookupApplier
): number | null {
  const match = matchContext(context, sequence, filter, index);
  if (!match) return null;
  const { changed, lastPosition } = applyLookupRecords(sequence, match, applyNested);
  if (!changed) return null;
  return Math.max(1, lastPosition - index + 1);
}
