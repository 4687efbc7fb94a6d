/**
 * Sequence context and chained sequence context tables, formats 1-3.
 * Shared by GSUB lookup types 5/6 and GPOS lookup types 7/8.
 * https://learn.microsoft.com/en-us/typography/opentype/spec/chapter2#sequence-context-format-1-simple-glyph-contexts
 *
 * Non-chained rules decode into the chained shape with empty backtrack and
 * lookahead, so matching has one code path.
 */

import type { BigEndianBinaryReader } from "../BigEndianBinaryReader";
import { invalidFormat } from "../FontErrors";
import { type ClassDefinitionTable, loadClassDefinitionTable } from "./classDef";
import { type CoverageTable, loadCoverageTable } from "./coverage";

export interface SequenceLookupRecord {
  /** Index into the matched input sequence */
  sequenceIndex: number;
  lookupListIndex: number;
}

/**
 * Values are glyph ids (format 1) or class values (format 2). Backtrack is
 * nearest-first; `input` excludes the first input glyph.
 */
export interface ChainedSequenceRule {
  backtrack: readonly number[];
  input: readonly number[];
  lookahead: readonly number[];
  lookupRecords: readonly SequenceLookupRecord[];
}

export type SequenceContext =
  | {
      format: 1;
      coverage: CoverageTable;
      /** Indexed by coverage index */
      ruleSets: readonly (readonly ChainedSequenceRule[])[];
    }
  | {
      format: 2;
      coverage: CoverageTable;
      backtrackClassDef: ClassDefinitionTable;
      inputClassDef: ClassDefinitionTable;
      lookaheadClassDef: ClassDefinitionTable;
      /** Indexed by input class */
      ruleSets: readonly (readonly ChainedSequenceRule[])[];
    }
  | {
      format: 3;
      backtrackCoverages: readonly CoverageTable[];
      inputCoverages: readonly CoverageTable[];
      lookaheadCoverages: readonly CoverageTable[];
      lookupRecords: readonly SequenceLookupRecord[];
    };

function readLookupRecords(reader: BigEndianBinaryReader, count: number): SequenceLookupRecord[] {
  const raw = reader.readUInt16Array(count * 2);
  const out: SequenceLookupRecord[] = [];
  for (let i = 0; i < count; i++) {
    out.push({ sequenceIndex: raw[i * 2], lookupListIndex: raw[i * 2 + 1] });
  }
  return out;
}

function loadRuleSets(
  reader: BigEndianBinaryReader,
  subtableOffset: number,
  ruleSetOffsets: readonly number[],
  readRule: () => ChainedSequenceRule
): ChainedSequenceRule[][] {
  return ruleSetOffsets.map((setOffset) => {
    if (setOffset === 0) return [];
    const setBase = subtableOffset + setOffset;
    reader.seek(setBase);
    const ruleCount = reader.readUInt16();
    const ruleOffsets = reader.readOffset16Array(ruleCount);
    return ruleOffsets.map((ruleOffset) => {
      reader.seek(setBase + ruleOffset);
      return readRule();
    });
  });
}

function readSequenceRule(reader: BigEndianBinaryReader): ChainedSequenceRule {
  // SequenceRule / ClassSequenceRule
  // uint16 glyphCount, uint16 seqLookupCount, uint16 inputSequence[glyphCount - 1],
  // SequenceLookupRecord seqLookupRecords[seqLookupCount]
  const glyphCount = reader.readUInt16();
  const seqLookupCount = reader.readUInt16();
  const input = reader.readUInt16Array(Math.max(0, glyphCount - 1));
  const lookupRecords = readLookupRecords(reader, seqLookupCount);
  return { backtrack: [], input, lookahead: [], lookupRecords };
}

function readChainedSequenceRule(reader: BigEndianBinaryReader): ChainedSequenceRule {
  // ChainedSequenceRule / ChainedClassSequenceRule
  // uint16 backtrackGlyphCount, uint16 backtrackSequence[backtrackGlyphCount],
  // uint16 inputGlyphCount, uint16 inputSequence[inputGlyphCount - 1],
  // uint16 lookaheadGlyphCount, uint16 lookaheadSequence[lookaheadGlyphCount],
  // uint16 seqLookupCount, SequenceLookupRecord seqLookupRecords[seqLookupCount]
  const backtrackGlyphCount = reader.readUInt16();
  const backtrack = reader.readUInt16Array(backtrackGlyphCount);
  const inputGlyphCount = reader.readUInt16();
  const input = reader.readUInt16Array(Math.max(0, inputGlyphCount - 1));
  const lookaheadGlyphCount = reader.readUInt16();
  const lookahead = reader.readUInt16Array(lookaheadGlyphCount);
  const seqLookupCount = reader.readUInt16();
  const lookupRecords = readLookupRecords(reader, seqLookupCount);
  return { backtrack, input, lookahead, lookupRecords };
}

function loadCoverageList(
  reader: BigEndianBinaryReader,
  subtableOffset: number,
  offsets: readonly number[]
): CoverageTable[] {
  return offsets.map((o) => loadCoverageTable(reader, subtableOffset + o));
}

/**
 * Loads a (non-chained) sequence context subtable at `offset`.
 * `formatField` names the discriminator in errors ("substFormat" / "posFormat").
 */
export function loadSequenceContext(
  reader: BigEndianBinaryReader,
  offset: number,
  formatField: string
): SequenceContext {
  reader.seek(offset);
  const format = reader.readUInt16();

  switch (format) {
    case 1: {
      const coverageOffset = reader.readOffset16();
      const seqRuleSetCount = reader.readUInt16();
      const ruleSetOffsets = reader.readOffset16Array(seqRuleSetCount);
      const ruleSets = loadRuleSets(reader, offset, ruleSetOffsets, () => readSequenceRule(reader));
      const coverage = loadCoverageTable(reader, offset + coverageOffset);
      return { format: 1, coverage, ruleSets };
    }
    case 2: {
      const coverageOffset = reader.readOffset16();
      const classDefOffset = reader.readOffset16();
      const classSeqRuleSetCount = reader.readUInt16();
      const ruleSetOffsets = reader.readOffset16Array(classSeqRuleSetCount);
      const ruleSets = loadRuleSets(reader, offset, ruleSetOffsets, () => readSequenceRule(reader));
      const coverage = loadCoverageTable(reader, offset + coverageOffset);
      const classDef = loadClassDefinitionTable(reader, offset + classDefOffset);
      return {
        format: 2,
        coverage,
        backtrackClassDef: classDef,
        inputClassDef: classDef,
        lookaheadClassDef: classDef,
        ruleSets,
      };
    }
    case 3: {
      const glyphCount = reader.readUInt16();
      const seqLookupCount = reader.readUInt16();
      const coverageOffsets = reader.readOffset16Array(glyphCount);
      const lookupRecords = readLookupRecords(reader, seqLookupCount);
      return {
        format: 3,
        backtrackCoverages: [],
        inputCoverages: loadCoverageList(reader, offset, coverageOffsets),
        lookaheadCoverages: [],
        lookupRecords,
      };
    }
    default:
      return invalidFormat(formatField, format, [1, 2, 3]);
  }
}

/**
 * Loads a chained sequence context subtable at `offset`.
 */
export function loadChainedSequenceContext(
  reader: BigEndianBinaryReader,
  offset: number,
  formatField: string
): SequenceContext {
  reader.seek(offset);
  const format = reader.readUInt16();

  switch (format) {
    case 1: {
      const coverageOffset = reader.readOffset16();
      const chainedSeqRuleSetCount = reader.readUInt16();
      const ruleSetOffsets = reader.readOffset16Array(chainedSeqRuleSetCount);
      const ruleSets = loadRuleSets(reader, offset, ruleSetOffsets, () =>
        readChainedSequenceRule(reader)
      );
      const coverage = loadCoverageTable(reader, offset + coverageOffset);
      return { format: 1, coverage, ruleSets };
    }
    case 2: {
      const coverageOffset = reader.readOffset16();
      const backtrackClassDefOffset = reader.readOffset16();
      const inputClassDefOffset = reader.readOffset16();
      const lookaheadClassDefOffset = reader.readOffset16();
      const chainedClassSeqRuleSetCount = reader.readUInt16();
      const ruleSetOffsets = reader.readOffset16Array(chainedClassSeqRuleSetCount);
      const ruleSets = loadRuleSets(reader, offset, ruleSetOffsets, () =>
        readChainedSequenceRule(reader)
      );
      const coverage = loadCoverageTable(reader, offset + coverageOffset);
      const inputClassDef = loadClassDefinitionTable(reader, offset + inputClassDefOffset);
      // A NULL backtrack/lookahead class def puts every glyph in class 0.
      const emptyClassDef: ClassDefinitionTable = { format: 2, ranges: [] };
      const backtrackClassDef =
        backtrackClassDefOffset === 0
          ? emptyClassDef
          : loadClassDefinitionTable(reader, offset + backtrackClassDefOffset);
      const lookaheadClassDef =
        lookaheadClassDefOffset === 0
          ? emptyClassDef
          : loadClassDefinitionTable(reader, offset + lookaheadClassDefOffset);
      return {
        format: 2,
        coverage,
        backtrackClassDef,
        inputClassDef,
        lookaheadClassDef,
        ruleSets,
      };
    }
    case 3: {
      const backtrackGlyphCount = reader.readUInt16();
      const backtrackOffsets = reader.readOffset16Array(backtrackGlyphCount);
      const inputGlyphCount = reader.readUInt16();
      const inputOffsets = reader.readOffset16Array(inputGlyphCount);
      const lookaheadGlyphCount = reader.readUInt16();
      const lookaheadOffsets = reader.readOffset16Array(lookaheadGlyphCount);
      const seqLookupCount = reader.readUInt16();
      const lookupRecords = readLookupRecords(reader, seqLookupCount);
      return {
        format: 3,
        backtrackCoverages: loadCoverageList(reader, offset, backtrackOffsets),
        inputCoverages: loadCoverageList(reader, offset, inputOffsets),
        lookaheadCoverages: loadCoverageList(reader, offset, lookaheadOffsets),
        lookupRecords,
      };
    }
    default:
      return invalidFormat(formatField, format, [1, 2, 3]);
  }
}

/** Every lookup record the context can invoke. */
export function contextLookupRecords(context: SequenceContext): SequenceLookupRecord[] {
  if (context.format === 3) return [...context.lookupRecords];
  const out: SequenceLookupRecord[] = [];
  for (const set of context.ruleSets) for (const rule of set) out.push(...rule.lookupRecords);
  return out;
}
