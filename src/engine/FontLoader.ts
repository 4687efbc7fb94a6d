/**
 * Font loading: fontkit provides the container facts (cmap, glyph count,
 * units per em, advance widths); GDEF, GSUB and GPOS are read from the raw
 * blob with one shared reader.
 */

import { readFile } from "node:fs/promises";
import * as fontkit from "fontkit";
import type { GlyphId } from "../types/layout.types";
import { GlyphSubstitutionCollection } from "./collections/GlyphSubstitutionCollection";
import { layoutLogger } from "./logger";
import { BigEndianBinaryReader } from "./parsers/BigEndianBinaryReader";
import { InvalidFontFileError } from "./parsers/FontErrors";
import { findTableOffset, readTableDirectory } from "./parsers/TableDirectory";
import { type GDefTable, loadGDefTable } from "./parsers/tables/gdef";
import { type GPosTable, type GSubTable, loadGPosTable, loadGSubTable } from "./parsers/tables/layout";
import type { LayoutFont } from "./ShapingPipeline";

export interface LoadedLayoutFont extends LayoutFont {
  postscriptName: string | null;
  /** Maps text through the font's cmap; unmapped characters become glyph 0 */
  glyphsForString(text: string): GlyphSubstitutionCollection;
}

function openFont(buffer: Buffer): fontkit.Font {
  const created = fontkit.create(buffer);
  if ("fonts" in created) {
    const first = created.fonts[0];
    if (!first) {
      throw new InvalidFontFileError("Font collection holds no fonts", { field: "numFonts", value: 0 });
    }
    return first;
  }
  return created;
}

/**
 * Load a font blob (TTF, OTF or the first face of a TTC).
 */
export function loadLayoutFont(bytes: ArrayBuffer | Uint8Array): LoadedLayoutFont {
  const startTime = Date.now();
  const data = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  const reader = new BigEndianBinaryReader(data);
  const directory = readTableDirectory(reader);

  const font = openFont(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
  const advanceCache = new Map<GlyphId, number>();

  const gdefRecord = findTableOffset(directory, "GDEF");
  const gsubRecord = findTableOffset(directory, "GSUB");
  const gposRecord = findTableOffset(directory, "GPOS");
  const gdef: GDefTable | undefined = gdefRecord ? loadGDefTable(reader, gdefRecord.offset) : undefined;
  const gsub: GSubTable | undefined = gsubRecord ? loadGSubTable(reader, gsubRecord.offset) : undefined;
  const gpos: GPosTable | undefined = gposRecord ? loadGPosTable(reader, gposRecord.offset) : undefined;

  layoutLogger.timed("info", "FontLoader", "loadLayoutFont", startTime, {
    format: directory.format,
    glyphCount: font.numGlyphs,
    tables: [gdefRecord, gsubRecord, gposRecord].filter((r) => r !== null).map((r) => r.tag),
  });

  return {
    postscriptName: font.postscriptName || null,
    metrics: {
      unitsPerEm: font.unitsPerEm,
      glyphCount: font.numGlyphs,
      advanceWidth(glyphId) {
        const cached = advanceCache.get(glyphId);
        if (cached !== undefined) return cached;
        const advance = glyphId < font.numGlyphs ? font.getGlyph(glyphId).advanceWidth : 0;
        advanceCache.set(glyphId, advance);
        return advance;
      },
    },
    gdef,
    gsub,
    gpos,
    glyphsForString(text) {
      const collection = new GlyphSubstitutionCollection();
      let cluster = 0;
      for (const char of text) {
        const codePoint = char.codePointAt(0) ?? 0;
        collection.add(font.glyphForCodePoint(codePoint).id, codePoint, cluster);
        cluster += char.length;
      }
      return collection;
    },
  };
}

export async function loadLayoutFontFile(path: string): Promise<LoadedLayoutFont> {
  const bytes = await readFile(path);
  return loadLayoutFont(bytes);
}
