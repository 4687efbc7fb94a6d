/**
 * Shared types for the layout engine
 */

/** 16-bit glyph index; 0 is .notdef */
export type GlyphId = number;

/** 4-character OpenType tag ("liga", "latn", "dflt") */
export type Tag = string;

export interface Point {
  x: number;
  y: number;
}

/**
 * Container-layer facts the shaping pipeline needs about a font.
 */
export interface FontMetricsProvider {
  unitsPerEm: number;
  glyphCount: number;
  /** Horizontal advance of a glyph in design units */
  advanceWidth(glyphId: GlyphId): number;
}

/**
 * Validation mode for shaping options
 */
export const ValidationMode = {
  STRICT: "strict" as const, // Throw on any invalid option
  LENIENT: "lenient" as const, // Fall back to defaults for invalid options, log warning
} as const;

export type ValidationMode = (typeof ValidationMode)[keyof typeof ValidationMode];

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  component: string;
  action: string;
  duration?: number;
  [key: string]: unknown;
}
