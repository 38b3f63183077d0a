import { countCodedLength, readCount, writeCount } from './ByteCountCoding.js';
import { DecodeError } from './errors.js';
import { PropertyFlags } from './PropertyFlags.js';
import type { EntityId } from './types.js';
import { bytesToUuid, UUID_BYTES, uuidToBytes } from './uuid.js';

// ── Encoder ─────────────────────────────────────────────

const INITIAL_BUFFER_SIZE = 256;
const MAX_U16 = 0xFFFF;
const textEncoder = new TextEncoder();

export class ProtocolEncoder {
  private buf: ArrayBuffer;
  private bytes: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialSize = INITIAL_BUFFER_SIZE) {
    this.buf = new ArrayBuffer(initialSize);
    this.bytes = new Uint8Array(this.buf);
    this.view = new DataView(this.buf);
  }

  private ensure(bytes: number) {
    if (this.offset + bytes <= this.buf.byteLength) return;
    let newSize = this.buf.byteLength * 2;
    while (newSize < this.offset + bytes) newSize *= 2;
    const newBuf = new ArrayBuffer(newSize);
    new Uint8Array(newBuf).set(this.bytes);
    this.buf = newBuf;
    this.bytes = new Uint8Array(this.buf);
    this.view = new DataView(this.buf);
  }

  get length(): number {
    return this.offset;
  }

  writeU8(v: number) {
    this.ensure(1);
    this.view.setUint8(this.offset, v);
    this.offset += 1;
  }

  writeU16(v: number) {
    this.ensure(2);
    this.view.setUint16(this.offset, v, true);
    this.offset += 2;
  }

  /** Timestamps: non-negative safe integers stored as u64 */
  writeU64(v: number) {
    if (!Number.isSafeInteger(v) || v < 0) {
      throw new RangeError(`u64 field must be a non-negative safe integer (got ${v})`);
    }
    this.ensure(8);
    this.view.setBigUint64(this.offset, BigInt(v), true);
    this.offset += 8;
  }

  writeF32(v: number) {
    this.ensure(4);
    this.view.setFloat32(this.offset, v, true);
    this.offset += 4;
  }

  writeBool(v: boolean) {
    this.writeU8(v ? 1 : 0);
  }

  writeVarint(v: number) {
    this.ensure(countCodedLength(v));
    this.offset += writeCount(this.bytes, this.offset, v);
  }

  writeBytes(data: Uint8Array) {
    if (data.byteLength > MAX_U16) {
      throw new RangeError(`Byte field too long: ${data.byteLength} > ${MAX_U16}`);
    }
    this.writeU16(data.byteLength);
    this.writeRaw(data);
  }

  writeString(s: string) {
    this.writeBytes(textEncoder.encode(s));
  }

  writeUuid(id: EntityId) {
    this.ensure(UUID_BYTES);
    uuidToBytes(id, this.bytes, this.offset);
    this.offset += UUID_BYTES;
  }

  /** Appends bytes with no length prefix */
  writeRaw(data: Uint8Array) {
    this.ensure(data.byteLength);
    this.bytes.set(data, this.offset);
    this.offset += data.byteLength;
  }

  /** Reset write position for reuse (no reallocation) */
  reset() {
    this.offset = 0;
  }

  /** Returns a trimmed copy of the written bytes */
  finish(): ArrayBuffer {
    return this.buf.slice(0, this.offset);
  }

  finishBytes(): Uint8Array {
    return new Uint8Array(this.finish());
  }
}

// ── Decoder ─────────────────────────────────────────────

const textDecoder = new TextDecoder('utf-8', { fatal: true });

/** Cursor reader. Every read checks the remaining length first. */
export class ProtocolDecoder {
  private bytes: Uint8Array;
  private view: DataView;
  private offset: number;

  constructor(bytes: Uint8Array = new Uint8Array(0), offset = 0) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = offset;
  }

  reset(bytes: Uint8Array, offset = 0) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  private need(n: number, what: string) {
    if (this.offset + n > this.bytes.byteLength) {
      throw new DecodeError(`Truncated ${what}: need ${n} bytes, ${this.remaining} left`, this.offset);
    }
  }

  readU8(): number {
    this.need(1, 'u8');
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  readU16(): number {
    this.need(2, 'u16');
    const v = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return v;
  }

  readU64(): number {
    this.need(8, 'u64');
    const big = this.view.getBigUint64(this.offset, true);
    if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError('u64 exceeds safe integer range', this.offset);
    }
    this.offset += 8;
    return Number(big);
  }

  readF32(): number {
    this.need(4, 'f32');
    const v = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return v;
  }

  readBool(): boolean {
    return this.readU8() !== 0;
  }

  readVarint(): number {
    const { value, length } = readCount(this.bytes, this.offset);
    this.offset += length;
    return value;
  }

  readBytes(): Uint8Array {
    const len = this.readU16();
    this.need(len, 'byte field');
    const out = this.bytes.slice(this.offset, this.offset + len);
    this.offset += len;
    return out;
  }

  readString(): string {
    const start = this.offset;
    const raw = this.readBytes();
    try {
      return textDecoder.decode(raw);
    } catch {
      throw new DecodeError('Invalid UTF-8 in string field', start);
    }
  }

  readUuid(): EntityId {
    this.need(UUID_BYTES, 'uuid');
    const id = bytesToUuid(this.bytes, this.offset);
    this.offset += UUID_BYTES;
    return id;
  }

  readFlags(): PropertyFlags {
    const { flags, length } = PropertyFlags.decode(this.bytes, this.offset);
    this.offset += length;
    return flags;
  }
}
