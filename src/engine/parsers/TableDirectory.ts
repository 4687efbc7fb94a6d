/**
 * sfnt table directory: locates tables inside a TrueType, CFF-flavoured
 * OpenType or collection (first face) blob.
 */

import { InvalidFontFileError, MalformedFontError } from "./FontErrors";
import { BigEndianBinaryReader } from "./BigEndianBinaryReader";

export type ContainerFormat = "ttf" | "otf" | "ttc" | "woff" | "woff2";

export interface TableRecord {
  tag: string;
  offset: number;
  length: number;
}

export interface TableDirectory {
  format: ContainerFormat;
  tables: Map<string, TableRecord>;
}

/**
 * Check font magic numbers to determine format
 */
export function detectFormat(bytes: Uint8Array): ContainerFormat | null {
  if (bytes.length < 4) return null;

  const magic = String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);
  switch (magic) {
    case "\x00\x01\x00\x00":
    case "true":
      return "ttf";
    case "OTTO":
      return "otf";
    case "ttcf":
      return "ttc";
    case "wOFF":
      return "woff";
    case "wOF2":
      return "woff2";
    default:
      return null;
  }
}

/**
 * Reads the table directory of face `faceIndex` (collections only; plain
 * fonts have a single face).
 */
export function readTableDirectory(reader: BigEndianBinaryReader, faceIndex = 0): TableDirectory {
  reader.seek(0);
  const head = new Uint8Array(4);
  for (let i = 0; i < 4 && i < reader.length; i++) head[i] = reader.readUInt8();
  const format = detectFormat(head);

  if (format === null) {
    throw new InvalidFontFileError("Unrecognised font container signature", { field: "sfntVersion" });
  }
  if (format === "woff" || format === "woff2") {
    throw new InvalidFontFileError(`Compressed ${format.toUpperCase()} fonts must be decoded first`, {
      field: "sfntVersion",
      value: format,
    });
  }

  let directoryOffset = 0;
  if (format === "ttc") {
    reader.seek(8);
    const numFonts = reader.readUInt32();
    if (faceIndex < 0 || faceIndex >= numFonts) {
      throw new InvalidFontFileError(`Face ${faceIndex} is not in a collection of ${numFonts}`, {
        field: "numFonts",
        value: faceIndex,
      });
    }
    reader.seek(12 + faceIndex * 4);
    directoryOffset = reader.readOffset32();
  }

  reader.seek(directoryOffset + 4);
  const numTables = reader.readUInt16();
  reader.seek(directoryOffset + 12);

  const tables = new Map<string, TableRecord>();
  for (let i = 0; i < numTables; i++) {
    const tag = reader.readTag();
    reader.readUInt32(); // checksum
    const offset = reader.readOffset32();
    const length = reader.readUInt32();
    if (offset + length > reader.length) {
      throw new MalformedFontError(
        `Table '${tag}' (offset ${offset}, length ${length}) runs past the end of the blob (${reader.length})`,
        { field: "tableRecord", value: tag }
      );
    }
    tables.set(tag, { tag, offset, length });
  }

  return { format, tables };
}

export function findTableOffset(directory: TableDirectory, tableTag: string): TableRecord | null {
  return directory.tables.get(tableTag) ?? null;
}
