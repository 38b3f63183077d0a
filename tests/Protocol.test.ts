import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DecodeError } from '../src/errors.js';
import { EntityPacketData } from '../src/PacketData.js';
import { ProtocolDecoder, ProtocolEncoder } from '../src/Protocol.js';

const ID = '0f1e2d3c-4b5a-6978-8796-a5b4c3d2e1f0';

// ── Encoder / decoder ───────────────────────────────────

describe('Protocol - primitives', () => {
  it('round-trips every primitive in order', () => {
    const enc = new ProtocolEncoder(4);
    enc.writeU8(7);
    enc.writeU16(0xBEEF);
    enc.writeU64(1_700_000_123_456_789);
    enc.writeF32(1.5);
    enc.writeBool(true);
    enc.writeVarint(300);
    enc.writeString('héllo');
    enc.writeUuid(ID);
    enc.writeBytes(Uint8Array.of(1, 2, 3));

    const dec = new ProtocolDecoder(enc.finishBytes());
    assert.equal(dec.readU8(), 7);
    assert.equal(dec.readU16(), 0xBEEF);
    assert.equal(dec.readU64(), 1_700_000_123_456_789);
    assert.equal(dec.readF32(), 1.5);
    assert.equal(dec.readBool(), true);
    assert.equal(dec.readVarint(), 300);
    assert.equal(dec.readString(), 'héllo');
    assert.equal(dec.readUuid(), ID);
    assert.deepEqual([...dec.readBytes()], [1, 2, 3]);
    assert.equal(dec.remaining, 0);
  });

  it('writes little-endian integers', () => {
    const enc = new ProtocolEncoder();
    enc.writeU16(0x0102);
    assert.deepEqual([...enc.finishBytes()], [0x02, 0x01]);
  });

  it('writes UUIDs in string byte order', () => {
    const enc = new ProtocolEncoder();
    enc.writeUuid(ID);
    const bytes = enc.finishBytes();
    assert.equal(bytes[0], 0x0f);
    assert.equal(bytes[15], 0xf0);
  });

  it('rejects u64 values outside the safe integer range', () => {
    assert.throws(() => new ProtocolEncoder().writeU64(-1), RangeError);
    assert.throws(() => new ProtocolEncoder().writeU64(2 ** 53), RangeError);
  });

  it('reset reuses the buffer', () => {
    const enc = new ProtocolEncoder();
    enc.writeU8(1);
    enc.reset();
    enc.writeU8(2);
    assert.deepEqual([...enc.finishBytes()], [2]);
  });
});

describe('Protocol - truncation', () => {
  it('throws DecodeError with the offending offset', () => {
    const dec = new ProtocolDecoder(Uint8Array.of(1, 2, 3));
    dec.readU8();
    assert.throws(() => dec.readU64(), (err: unknown) => err instanceof DecodeError && err.offset === 1);
  });

  it('throws when a byte field runs past the end', () => {
    assert.throws(() => new ProtocolDecoder(Uint8Array.of(5, 0, 1, 2)).readBytes(), DecodeError);
  });

  it('throws on invalid UTF-8', () => {
    assert.throws(() => new ProtocolDecoder(Uint8Array.of(1, 0, 0xFF)).readString(), DecodeError);
  });

  it('throws on a short UUID', () => {
    assert.throws(() => new ProtocolDecoder(new Uint8Array(15)).readUuid(), DecodeError);
  });
});

// ── Packet buffer ───────────────────────────────────────

describe('EntityPacketData', () => {
  it('appends all or nothing', () => {
    const packet = new EntityPacketData(4);
    assert.equal(packet.appendBytes(Uint8Array.of(1, 2, 3)), true);
    assert.equal(packet.appendBytes(Uint8Array.of(4, 5)), false);
    assert.equal(packet.length, 3);
    assert.equal(packet.appendU8(4), true);
    assert.equal(packet.remaining, 0);
  });

  it('discards back to a level', () => {
    const packet = new EntityPacketData(8);
    packet.appendBytes(Uint8Array.of(1));
    const level = packet.startLevel();
    packet.appendBytes(Uint8Array.of(2, 3));
    packet.discardLevel(level);
    assert.deepEqual([...packet.view()], [1]);
  });

  it('patches and removes prior bytes', () => {
    const packet = new EntityPacketData(8);
    packet.appendBytes(Uint8Array.of(1, 2, 3, 4, 5));
    packet.updatePriorBytes(1, Uint8Array.of(9));
    packet.removeBytes(2, 2);
    assert.deepEqual([...packet.view()], [1, 9, 5]);
    assert.throws(() => packet.updatePriorBytes(2, Uint8Array.of(0, 0)), RangeError);
  });

  it('finish copies the written bytes', () => {
    const packet = new EntityPacketData(8);
    packet.appendBytes(Uint8Array.of(1, 2));
    const out = packet.finish();
    assert.equal(out.byteLength, 2);
    assert.deepEqual([...new Uint8Array(out)], [1, 2]);
  });
});
