import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createEncodeContinuation } from '../src/EncodeContinuation.js';
import { encodeEntityRecord, readEntityDataFromBuffer } from '../src/EntityCodec.js';
import { EntityItem } from '../src/EntityItem.js';
import { propertiesForVersion } from '../src/EntityProperties.js';
import { createEntityTree } from '../src/EntityTree.js';
import { createEntityEnvironment } from '../src/Environment.js';
import { silentLogger } from '../src/Logger.js';
import { EntityPacketData } from '../src/PacketData.js';
import { PropertyFlags } from '../src/PropertyFlags.js';
import { CURRENT_PROTOCOL_VERSION, EntityTypes, USECS_PER_SECOND } from '../src/types.js';

const ID = '7e7e7e7e-0000-4000-8000-000000000001';
const T0 = 1_650_000_000 * USECS_PER_SECOND;
const HEADER = 35;

function env() {
  return createEntityEnvironment({ now: () => T0, logger: silentLogger });
}

function source(id = ID): EntityItem {
  const entity = new EntityItem(env(), { id, type: EntityTypes.Sphere });
  entity.recordCreationTime();
  entity.setProperties({
    position: { x: 4, y: 0, z: -2 },
    // f32-exact values, so the receiver's copy compares equal
    dimensions: { x: 2, y: 2, z: 1 },
    damping: 0.25,
    angularDamping: 0.125,
    name: 'ball',
    description: 'a partially encoded entity',
    userData: '{"bounces":3}',
  });
  return entity;
}

// ── Encode continuation ─────────────────────────────────

describe('EncodeContinuation', () => {
  it('hands back the requested set until something is stored', () => {
    const continuation = createEncodeContinuation();
    const requested = PropertyFlags.of(1, 2, 24);
    assert.deepEqual(continuation.pendingFor(ID, requested).toArray(), [1, 2, 24]);

    continuation.store(ID, PropertyFlags.of(24));
    assert.deepEqual(continuation.pendingFor(ID, requested).toArray(), [24]);
    assert.deepEqual(continuation.pendingIds(), [ID]);
  });

  it('forgets an entity once nothing is left or it completes', () => {
    const continuation = createEncodeContinuation();
    continuation.store(ID, PropertyFlags.of(3));
    continuation.store(ID, new PropertyFlags());
    assert.equal(continuation.has(ID), false);

    continuation.store(ID, PropertyFlags.of(3));
    continuation.complete(ID);
    assert.equal(continuation.size, 0);
  });

  it('stores a copy of the flags', () => {
    const continuation = createEncodeContinuation();
    const left = PropertyFlags.of(5);
    continuation.store(ID, left);
    left.add(6);
    assert.deepEqual(continuation.pendingFor(ID, new PropertyFlags()).toArray(), [5]);
  });
});

// ── Spillover across packets ────────────────────────────

describe('partial encode', () => {
  it('splits a record into disjoint parts that cover the request', () => {
    const entity = source();
    const continuation = createEncodeContinuation();
    const requested = propertiesForVersion(CURRENT_PROTOCOL_VERSION);

    const small = new EntityPacketData(HEADER + requested.encodedLength + 40);
    const first = encodeEntityRecord(entity, small, { continuation });
    assert.equal(first.state, 'partial');
    assert.equal(first.included.isEmpty(), false);
    assert.ok(first.included.size < requested.size);
    assert.deepEqual(continuation.pendingFor(ID, requested).toArray(), first.didntFit.toArray());

    const large = new EntityPacketData(4096);
    const second = encodeEntityRecord(entity, large, { continuation });
    assert.equal(second.state, 'completed');
    assert.ok(second.included.equals(first.didntFit));
    assert.equal(second.included.intersect(first.included).isEmpty(), true);
    assert.ok(first.included.union(second.included).equals(requested));
    assert.equal(continuation.has(ID), false);
  });

  it('leaves the pending set untouched when not even the header fits', () => {
    const entity = source();
    const continuation = createEncodeContinuation();
    continuation.store(ID, PropertyFlags.of(24));

    const result = encodeEntityRecord(entity, new EntityPacketData(HEADER), { continuation });
    assert.equal(result.state, 'none');
    assert.deepEqual(continuation.pendingFor(ID, new PropertyFlags()).toArray(), [24]);
  });

  it('rebuilds the entity on a receiver fed both parts', () => {
    const entity = source();
    const continuation = createEncodeContinuation();
    const budget = HEADER + propertiesForVersion(CURRENT_PROTOCOL_VERSION).encodedLength + 40;

    const parts: Uint8Array[] = [];
    for (let guard = 0; guard < 20; guard++) {
      const packet = new EntityPacketData(budget);
      const result = encodeEntityRecord(entity, packet, { continuation });
      assert.notEqual(result.state, 'none');
      parts.push(packet.view().slice());
      if (result.state === 'completed') break;
    }
    assert.ok(parts.length > 1);

    const target = new EntityItem(env(), { id: ID });
    for (const part of parts) {
      assert.equal(readEntityDataFromBuffer(target, part, { version: CURRENT_PROTOCOL_VERSION }), part.byteLength);
    }
    assert.deepEqual(target.getProperties(), entity.getProperties());
  });
});

// ── Tree level ──────────────────────────────────────────

describe('EntityTree - split packets', () => {
  it('spreads entities over packets no larger than the budget', () => {
    const sender = createEntityTree(env());
    const receiver = createEntityTree(env());
    const ids = [1, 2, 3].map(n => sender.addEntity({
      id: `7e7e7e7e-0000-4000-8000-00000000000${n}`,
      type: EntityTypes.Box,
      properties: {
        position: { x: n, y: n, z: n },
        dimensions: { x: 2, y: 2, z: 1 },
        damping: 0.5,
        angularDamping: 0.5,
        name: `box-${n}`,
        description: 'split over several packets',
      },
    }).id);

    const continuation = createEncodeContinuation();
    const packets = sender.encodeEntityPackets(ids, continuation, { maxPacketSize: 120 });
    assert.ok(packets.length > ids.length);
    for (const packet of packets) assert.ok(packet.byteLength <= 120);
    assert.equal(continuation.size, 0);

    for (const packet of packets) {
      const result = receiver.readEntityPacket(new Uint8Array(packet));
      assert.equal(result.error, null);
      assert.equal(result.applied, result.expected);
    }
    assert.equal(receiver.size, 3);
    for (const id of ids) {
      const original = sender.findEntity(id);
      const copy = receiver.findEntity(id);
      assert.ok(original && copy);
      assert.deepEqual(copy.getProperties(), original.getProperties());
      assert.equal(copy.type, EntityTypes.Box);
    }
  });

  it('keeps an entity pending when no packet can hold its header', () => {
    const tree = createEntityTree(env());
    const entity = tree.addEntity({ properties: { name: 'too big' } });
    const continuation = createEncodeContinuation();
    assert.deepEqual(tree.encodeEntityPackets([entity.id], continuation, { maxPacketSize: 30 }), []);
    assert.equal(continuation.has(entity.id), true);
  });

  it('completes ids the tree does not hold', () => {
    const tree = createEntityTree(env());
    const continuation = createEncodeContinuation();
    continuation.store(ID, PropertyFlags.of(24));
    assert.deepEqual(tree.encodeEntityPackets([ID], continuation), []);
    assert.equal(continuation.has(ID), false);
  });
});
