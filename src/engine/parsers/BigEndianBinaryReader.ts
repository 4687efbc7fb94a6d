/**
 * Big-endian cursor over a resident font blob.
 * All positions are absolute (from the start of the blob); table loaders add
 * their own base offset to the relative offsets they read.
 */

import { MalformedFontError } from "./FontErrors";
import { tag4 } from "./tables/formatters";

export class BigEndianBinaryReader {
  private readonly view: DataView;
  private cursor = 0;

  constructor(data: ArrayBuffer | Uint8Array) {
    this.view =
      data instanceof Uint8Array
        ? new DataView(data.buffer, data.byteOffset, data.byteLength)
        : new DataView(data);
  }

  get position(): number {
    return this.cursor;
  }

  get length(): number {
    return this.view.byteLength;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.view.byteLength) {
      throw new MalformedFontError(
        `Cannot seek to offset ${offset}; blob length is ${this.view.byteLength}`,
        { field: "seek", value: offset }
      );
    }
    this.cursor = offset;
  }

  readUInt8(): number {
    const at = this.take(1, "uint8");
    return this.view.getUint8(at);
  }

  readUInt16(): number {
    const at = this.take(2, "uint16");
    return this.view.getUint16(at, false);
  }

  readInt16(): number {
    const at = this.take(2, "int16");
    return this.view.getInt16(at, false);
  }

  readUInt32(): number {
    const at = this.take(4, "uint32");
    return this.view.getUint32(at, false);
  }

  readInt32(): number {
    const at = this.take(4, "int32");
    return this.view.getInt32(at, false);
  }

  readOffset16(): number {
    return this.readUInt16();
  }

  readOffset32(): number {
    return this.readUInt32();
  }

  readTag(): string {
    const at = this.take(4, "Tag");
    return tag4(
      this.view.getUint8(at),
      this.view.getUint8(at + 1),
      this.view.getUint8(at + 2),
      this.view.getUint8(at + 3)
    );
  }

  readUInt16Array(count: number): number[] {
    const at = this.take(count * 2, `uint16[${count}]`);
    const out = new Array<number>(count);
    for (let i = 0; i < count; i++) out[i] = this.view.getUint16(at + i * 2, false);
    return out;
  }

  readOffset16Array(count: number): number[] {
    return this.readUInt16Array(count);
  }

  /**
   * Reserves `size` bytes at the cursor and returns their start; the whole span
   * is checked before anything is read.
   */
  private take(size: number, what: string): number {
    const at = this.cursor;
    if (at + size > this.view.byteLength) {
      throw new MalformedFontError(
        `Cannot read ${what} at offset ${at}: ${size} byte(s) requested, ${this.view.byteLength - at} remaining`,
        { field: what, value: at }
      );
    }
    this.cursor = at + size;
    return at;
  }
}
