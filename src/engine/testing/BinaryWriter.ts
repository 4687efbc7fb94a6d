/**
 * Big-endian byte builder for test fixtures.
 */

export class BinaryWriter {
  private readonly bytes: number[] = [];

  get length(): number {
    return this.bytes.length;
  }

  uint8(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  uint16(...values: number[]): this {
    for (const v of values) this.bytes.push((v >> 8) & 0xff, v & 0xff);
    return this;
  }

  int16(...values: number[]): this {
    return this.uint16(...values.map((v) => v & 0xffff));
  }

  uint32(...values: number[]): this {
    for (const v of values) {
      this.bytes.push((v >>> 24) & 0xff, (v >>> 16) & 0xff, (v >>> 8) & 0xff, v & 0xff);
    }
    return this;
  }

  int32(...values: number[]): this {
    return this.uint32(...values.map((v) => v >>> 0));
  }

  tag(tag: string): this {
    for (let i = 0; i < 4; i++) this.bytes.push(tag.charCodeAt(i) || 0x20);
    return this;
  }

  raw(bytes: readonly number[]): this {
    this.bytes.push(...bytes);
    return this;
  }

  /** Overwrites two bytes at `at` (for offsets known only later). */
  patchUint16(at: number, value: number): this {
    this.bytes[at] = (value >> 8) & 0xff;
    this.bytes[at + 1] = value & 0xff;
    return this;
  }

  toArray(): number[] {
    return [...this.bytes];
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

export const u16 = (...values: number[]): number[] => new BinaryWriter().uint16(...values).toArray();
export const i16 = (...values: number[]): number[] => new BinaryWriter().int16(...values).toArray();
export const u32 = (...values: number[]): number[] => new BinaryWriter().uint32(...values).toArray();
export const tagBytes = (tag: string): number[] => new BinaryWriter().tag(tag).toArray();

/**
 * Lays `children` out one after another behind a header whose size does not
 * depend on the offsets it holds. `header` receives each child's offset from
 * the start of the result.
 */
export function withChildren(header: (offsets: number[]) => number[], children: readonly number[][]): number[] {
  const headerSize = header(children.map(() => 0)).length;
  const offsets: number[] = [];
  let at = headerSize;
  for (const child of children) {
    offsets.push(at);
    at += child.length;
  }
  return [...header(offsets), ...children.flat()];
}
