import { DecodeError } from './errors.js';

/** Enough groups for 70 property tags; more is a malformed stream. */
export const MAX_PROPERTY_FLAG_BYTES = 10;

const BITS_PER_BYTE = 7;
const MORE = 0x80;

/**
 * Presence set of property tags. On the wire: 7 tags per byte (tag 0 is bit 0
 * of the first byte), high bit set while more bytes follow, trailing empty
 * groups trimmed, never shorter than one byte.
 */
export class PropertyFlags implements Iterable<number> {
  private readonly tags = new Set<number>();

  static of(...tags: number[]): PropertyFlags {
    const flags = new PropertyFlags();
    for (const tag of tags) flags.add(tag);
    return flags;
  }

  add(tag: number): this {
    if (!Number.isInteger(tag) || tag < 0 || tag >= MAX_PROPERTY_FLAG_BYTES * BITS_PER_BYTE) {
      throw new RangeError(`Invalid property tag ${tag}`);
    }
    this.tags.add(tag);
    return this;
  }

  remove(tag: number): this {
    this.tags.delete(tag);
    return this;
  }

  has(tag: number): boolean {
    return this.tags.has(tag);
  }

  get size(): number {
    return this.tags.size;
  }

  isEmpty(): boolean {
    return this.tags.size === 0;
  }

  clone(): PropertyFlags {
    return PropertyFlags.of(...this.tags);
  }

  union(other: PropertyFlags): PropertyFlags {
    const result = this.clone();
    for (const tag of other) result.add(tag);
    return result;
  }

  minus(other: PropertyFlags): PropertyFlags {
    const result = new PropertyFlags();
    for (const tag of this.tags) {
      if (!other.has(tag)) result.add(tag);
    }
    return result;
  }

  intersect(other: PropertyFlags): PropertyFlags {
    const result = new PropertyFlags();
    for (const tag of this.tags) {
      if (other.has(tag)) result.add(tag);
    }
    return result;
  }

  equals(other: PropertyFlags): boolean {
    if (other.size !== this.size) return false;
    for (const tag of this.tags) {
      if (!other.has(tag)) return false;
    }
    return true;
  }

  /** Ascending tag order, which is also canonical wire order */
  *[Symbol.iterator](): Iterator<number> {
    const sorted = [...this.tags].sort((a, b) => a - b);
    yield* sorted;
  }

  toArray(): number[] {
    return [...this];
  }

  get encodedLength(): number {
    let highest = -1;
    for (const tag of this.tags) if (tag > highest) highest = tag;
    return Math.max(1, Math.ceil((highest + 1) / BITS_PER_BYTE));
  }

  encode(): Uint8Array {
    const length = this.encodedLength;
    const out = new Uint8Array(length);
    for (const tag of this.tags) {
      const byte = Math.floor(tag / BITS_PER_BYTE);
      out[byte] |= 1 << (tag % BITS_PER_BYTE);
    }
    for (let i = 0; i < length - 1; i++) out[i] |= MORE;
    return out;
  }

  static decode(bytes: Uint8Array, offset: number): { flags: PropertyFlags; length: number } {
    const flags = new PropertyFlags();
    for (let i = 0; i < MAX_PROPERTY_FLAG_BYTES; i++) {
      const at = offset + i;
      if (at >= bytes.length) throw new DecodeError('Truncated property flags', offset);
      const b = bytes[at];
      for (let bit = 0; bit < BITS_PER_BYTE; bit++) {
        if (b & (1 << bit)) flags.add(i * BITS_PER_BYTE + bit);
      }
      if ((b & MORE) === 0) return { flags, length: i + 1 };
    }
    throw new DecodeError(`Property flags longer than ${MAX_PROPERTY_FLAG_BYTES} bytes`, offset);
  }

  toString(): string {
    return `{${this.toArray().join(',')}}`;
  }
}
