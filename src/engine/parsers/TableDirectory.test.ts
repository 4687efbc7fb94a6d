import { describe, expect, it } from "vitest";
import { BinaryWriter } from "../testing/BinaryWriter";
import { readerFor, sfnt } from "../testing/layoutFixtures";
import { InvalidFontFileError, MalformedFontError } from "./FontErrors";
import { detectFormat, findTableOffset, readTableDirectory } from "./TableDirectory";

const signature = (s: string) => Uint8Array.from(s, (c) => c.charCodeAt(0));

describe("detectFormat", () => {
  it("recognises container signatures", () => {
    expect(detectFormat(Uint8Array.from([0, 1, 0, 0]))).toBe("ttf");
    expect(detectFormat(signature("true"))).toBe("ttf");
    expect(detectFormat(signature("OTTO"))).toBe("otf");
    expect(detectFormat(signature("ttcf"))).toBe("ttc");
    expect(detectFormat(signature("wOFF"))).toBe("woff");
    expect(detectFormat(signature("wOF2"))).toBe("woff2");
    expect(detectFormat(signature("%PDF"))).toBeNull();
    expect(detectFormat(signature("OT"))).toBeNull();
  });
});

describe("readTableDirectory", () => {
  it("lists the tables of a single font", () => {
    const bytes = sfnt([
      ["GDEF", [1, 2, 3, 4]],
      ["GSUB", [5, 6]],
    ]);
    const directory = readTableDirectory(readerFor(bytes));

    expect(directory.format).toBe("ttf");
    expect([...directory.tables.keys()]).toEqual(["GDEF", "GSUB"]);
    expect(findTableOffset(directory, "GDEF")).toEqual({ tag: "GDEF", offset: 44, length: 4 });
    expect(findTableOffset(directory, "GSUB")).toEqual({ tag: "GSUB", offset: 48, length: 2 });
    expect(findTableOffset(directory, "GPOS")).toBeNull();
  });

  it("reads CFF-flavoured fonts", () => {
    const bytes = sfnt([["GPOS", [0, 0]]], 0x4f54544f);
    expect(readTableDirectory(readerFor(bytes)).format).toBe("otf");
  });

  it("reads the first face of a collection", () => {
    // ttc header (16 bytes), then one sfnt directory (28 bytes), then the table at 44.
    const bytes = new BinaryWriter()
      .tag("ttcf")
      .uint16(1, 0)
      .uint32(1, 16)
      .uint32(0x00010000)
      .uint16(1, 0, 0, 0)
      .tag("GSUB")
      .uint32(0, 44, 2)
      .uint16(0xabcd)
      .toArray();
    const directory = readTableDirectory(readerFor(bytes));

    expect(directory.format).toBe("ttc");
    expect(findTableOffset(directory, "GSUB")).toEqual({ tag: "GSUB", offset: 44, length: 2 });
    expect(() => readTableDirectory(readerFor(bytes), 1)).toThrow("Face 1 is not in a collection of 1");
  });

  it("rejects compressed and unknown containers", () => {
    expect(() => readTableDirectory(readerFor([...signature("wOF2"), 0, 0, 0, 0]))).toThrow(
      "Compressed WOFF2 fonts must be decoded first"
    );
    expect(() => readTableDirectory(readerFor([1, 2, 3, 4, 5, 6]))).toThrow(InvalidFontFileError);
  });

  it("rejects a table record that runs past the blob", () => {
    const bytes = sfnt([["GSUB", [5, 6]]]);
    bytes.pop();
    expect(() => readTableDirectory(readerFor(bytes))).toThrow(MalformedFontError);
    expect(() => readTableDirectory(readerFor(bytes))).toThrow(
      "Table 'GSUB' (offset 28, length 2) runs past the end of the blob (29)"
    );
  });
});
