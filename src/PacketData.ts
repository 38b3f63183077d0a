/**
 * Fixed-budget packet buffer. Appends are all-or-nothing: bytes that do not
 * fit in the remaining budget are not written and the append reports false.
 */
export class EntityPacketData {
  private readonly bytes: Uint8Array;
  private size = 0;

  constructor(readonly capacity: number) {
    this.bytes = new Uint8Array(capacity);
  }

  get length(): number {
    return this.size;
  }

  get remaining(): number {
    return this.capacity - this.size;
  }

  appendBytes(data: Uint8Array): boolean {
    if (data.byteLength > this.remaining) return false;
    this.bytes.set(data, this.size);
    this.size += data.byteLength;
    return true;
  }

  appendU8(v: number): boolean {
    return this.appendBytes(Uint8Array.of(v & 0xFF));
  }

  /** Marks the start of a record; pass the result to discardLevel to roll it back. */
  startLevel(): number {
    return this.size;
  }

  discardLevel(level: number) {
    this.size = level;
  }

  /** Overwrites already-written bytes (never extends the packet). */
  updatePriorBytes(offset: number, data: Uint8Array) {
    if (offset + data.byteLength > this.size) {
      throw new RangeError(`updatePriorBytes past end of written data (${offset}+${data.byteLength} > ${this.size})`);
    }
    this.bytes.set(data, offset);
  }

  /** Removes `count` bytes at `offset`, shifting the tail down. */
  removeBytes(offset: number, count: number) {
    if (count <= 0) return;
    this.bytes.copyWithin(offset, offset + count, this.size);
    this.size -= count;
  }

  /** View of the written bytes (shares memory with the packet) */
  view(): Uint8Array {
    return this.bytes.subarray(0, this.size);
  }

  finish(): ArrayBuffer {
    const out = new ArrayBuffer(this.size);
    new Uint8Array(out).set(this.bytes.subarray(0, this.size));
    return out;
  }
}
