import { randomUUID } from 'node:crypto';
import type { EncodeContinuation } from './EncodeContinuation.js';
import type { ActionFactory, ActionSimulation } from './EntityAction.js';
import { decodeEntityRecord, encodeEntityRecord, peekEntityId, readEntityDataFromBuffer } from './EntityCodec.js';
import type { EntityEdit } from './EntityItem.js';
import { EntityItem } from './EntityItem.js';
import { DecodeError } from './errors.js';
import { EntityPacketData } from './PacketData.js';
import { ProtocolDecoder, ProtocolEncoder } from './Protocol.js';
import type { PropertyFlags } from './PropertyFlags.js';
import type { EntityEnvironment, EntityId, EntityType } from './types.js';
import { CURRENT_PROTOCOL_VERSION, MSG_ENTITY_DATA, MSG_ENTITY_ERASE, PACKET_HEADER_BYTES } from './types.js';
import { UUID_BYTES } from './uuid.js';

export const DEFAULT_MAX_PACKET_SIZE = 1400;
const MAX_RECORDS_PER_PACKET = 0xFFFF;

// ── Collaborators ───────────────────────────────────────

/** What an entity record needs from the structure that stores it. */
export interface SpatialIndex {
  isDeletedEntity(id: EntityId): boolean;
  /** An edit made at `lastEdited` (receiver clock) arrived in `bytes` bytes */
  trackIncomingEntityLastEdited(lastEdited: number, bytes: number): void;
  /** Simulation holding the entity, if any */
  simulationFor(id: EntityId): ActionSimulation | null;
}

/** Simulation side of the tree: entities join and leave it with the tree. */
export interface TreeSimulation extends ActionSimulation {
  addEntity(entity: EntityItem): void;
  removeEntity(entity: EntityItem): void;
}

export interface EntityTreeOptions {
  simulation?: TreeSimulation | null;
  actionFactory?: ActionFactory | null;
}

export interface IncomingEditStats {
  count: number;
  bytes: number;
  /** Sum and max of (arrival − lastEdited), µs */
  totalLag: number;
  maxLag: number;
}

export interface ReadPacketResult {
  version: number;
  /** Record count announced by the header */
  expected: number;
  applied: number;
  created: EntityId[];
  /** Set when reading stopped at a malformed record */
  error: DecodeError | null;
}

export interface ReadErasePacketResult {
  erased: EntityId[];
  error: DecodeError | null;
}

export interface EncodePacketsOptions {
  version?: number;
  maxPacketSize?: number;
  requested?: PropertyFlags;
  trackSend?: (id: EntityId, lastEdited: number) => void;
}

export interface AddEntityOptions {
  id?: EntityId;
  type?: EntityType;
  properties?: EntityEdit;
}

export interface EntityTree extends SpatialIndex {
  readonly env: EntityEnvironment;
  readonly size: number;
  readonly simulation: TreeSimulation | null;
  addEntity(options?: AddEntityOptions): EntityItem;
  findEntity(id: EntityId): EntityItem | undefined;
  entities(): EntityItem[];
  deleteEntity(id: EntityId): boolean;
  readEntityPacket(buffer: Uint8Array, options?: { clockSkew?: number }): ReadPacketResult;
  encodeEntityPackets(ids: EntityId[], continuation: EncodeContinuation, options?: EncodePacketsOptions): ArrayBuffer[];
  encodeErasePacket(ids: EntityId[], version?: number): ArrayBuffer;
  readErasePacket(buffer: Uint8Array): ReadErasePacketResult;
  deletedSince(time: number): EntityId[];
  pruneDeletedEntities(): number;
  readonly incomingStats: IncomingEditStats;
  resetIncomingStats(): void;
}

// ── Packet header ───────────────────────────────────────

export interface PacketHeader {
  type: number;
  version: number;
  count: number;
}

export function writePacketHeader(out: ProtocolEncoder, header: PacketHeader) {
  out.writeU8(header.type);
  out.writeU16(header.version);
  out.writeU16(header.count);
}

export function readPacketHeader(input: ProtocolDecoder): PacketHeader {
  const type = input.readU8();
  const version = input.readU16();
  const count = input.readU16();
  return { type, version, count };
}

// ── Tree ────────────────────────────────────────────────

export function createEntityTree(env: EntityEnvironment, options?: EntityTreeOptions): EntityTree {
  const simulation = options?.simulation ?? null;
  const actionFactory = options?.actionFactory ?? null;
  const entities = new Map<EntityId, EntityItem>();
  const deleted = new Map<EntityId, number>();
  let stats: IncomingEditStats = { count: 0, bytes: 0, totalLag: 0, maxLag: 0 };

  function insert(entity: EntityItem) {
    entities.set(entity.id, entity);
    deleted.delete(entity.id);
    entity.markIndexed(true);
    simulation?.addEntity(entity);
  }

  function release(entity: EntityItem) {
    simulation?.removeEntity(entity);
    entity.markIndexed(false);
    entities.delete(entity.id);
  }

  const tree: EntityTree = {
    env,

    get size() {
      return entities.size;
    },

    simulation,

    addEntity(opts) {
      const id = opts?.id ?? randomUUID();
      if (entities.has(id)) throw new Error(`Entity ${id} already exists`);
      const entity = new EntityItem(env, { id, type: opts?.type, actionFactory });
      entity.recordCreationTime();
      insert(entity);
      if (opts?.properties) entity.setProperties(opts.properties, simulation);
      return entity;
    },

    findEntity(id) {
      return entities.get(id);
    },

    entities() {
      return [...entities.values()];
    },

    deleteEntity(id) {
      const entity = entities.get(id);
      if (!entity) return false;
      release(entity);
      entity.destroy(simulation);
      deleted.set(id, env.now());
      return true;
    },

    // ── SpatialIndex ────────────────────────────────────

    isDeletedEntity(id) {
      return deleted.has(id);
    },

    trackIncomingEntityLastEdited(lastEdited, bytes) {
      const lag = Math.max(0, env.now() - lastEdited);
      stats.count++;
      stats.bytes += bytes;
      stats.totalLag += lag;
      stats.maxLag = Math.max(stats.maxLag, lag);
    },

    simulationFor(id) {
      return entities.has(id) ? simulation : null;
    },

    get incomingStats() {
      return { ...stats };
    },

    resetIncomingStats() {
      stats = { count: 0, bytes: 0, totalLag: 0, maxLag: 0 };
    },

    // ── Entity data packets ─────────────────────────────

    readEntityPacket(buffer, opts) {
      const input = new ProtocolDecoder(buffer);
      const result: ReadPacketResult = { version: 0, expected: 0, applied: 0, created: [], error: null };

      let header: PacketHeader;
      try {
        header = readPacketHeader(input);
        if (header.type !== MSG_ENTITY_DATA) {
          throw new DecodeError(`Not an entity data packet (type 0x${header.type.toString(16)})`, 0);
        }
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        env.logger.warn('Dropped entity packet with a bad header', { error: err.message });
        result.error = err;
        return result;
      }
      result.version = header.version;
      result.expected = header.count;

      let offset = input.position;
      for (let i = 0; i < header.count; i++) {
        const record = buffer.subarray(offset);
        let consumed: number;
        try {
          consumed = readRecord(record, header.version, opts?.clockSkew ?? 0, result);
        } catch (err) {
          if (!(err instanceof DecodeError)) throw err;
          result.error = err;
          break;
        }
        offset += consumed;
      }

      if (result.error) {
        env.logger.warn('Stopped reading entity packet at a malformed record', {
          applied: result.applied,
          expected: result.expected,
          error: result.error.message,
        });
      }
      return result;
    },

    encodeEntityPackets(ids, continuation, opts) {
      const version = opts?.version ?? CURRENT_PROTOCOL_VERSION;
      const maxPacketSize = opts?.maxPacketSize ?? DEFAULT_MAX_PACKET_SIZE;
      const packets: ArrayBuffer[] = [];

      let packet = startPacket(MSG_ENTITY_DATA, version, maxPacketSize);
      let count = 0;

      const flush = () => {
        if (count === 0) return;
        packet.updatePriorBytes(3, u16(count));
        packets.push(packet.finish());
        packet = startPacket(MSG_ENTITY_DATA, version, maxPacketSize);
        count = 0;
      };

      for (const id of ids) {
        const entity = entities.get(id);
        if (!entity) {
          continuation.complete(id);
          continue;
        }

        for (;;) {
          if (count === MAX_RECORDS_PER_PACKET) flush();
          const { state, bytesWritten } = encodeEntityRecord(entity, packet, {
            version,
            requested: opts?.requested,
            continuation,
            trackSend: opts?.trackSend,
          });
          if (bytesWritten > 0) count++;
          if (state === 'completed') break;
          if (count === 0) {
            env.logger.warn('Entity record does not fit an empty packet', { entity: id, maxPacketSize });
            break;
          }
          flush();
        }
      }
      flush();
      return packets;
    },

    // ── Erase packets ───────────────────────────────────

    encodeErasePacket(ids, version = CURRENT_PROTOCOL_VERSION) {
      if (ids.length > MAX_RECORDS_PER_PACKET) {
        throw new RangeError(`Too many ids for one erase packet: ${ids.length}`);
      }
      const out = new ProtocolEncoder(PACKET_HEADER_BYTES + ids.length * UUID_BYTES);
      writePacketHeader(out, { type: MSG_ENTITY_ERASE, version, count: ids.length });
      for (const id of ids) out.writeUuid(id);
      return out.finish();
    },

    readErasePacket(buffer) {
      const input = new ProtocolDecoder(buffer);
      const erased: EntityId[] = [];
      try {
        const header = readPacketHeader(input);
        if (header.type !== MSG_ENTITY_ERASE) {
          throw new DecodeError(`Not an erase packet (type 0x${header.type.toString(16)})`, 0);
        }
        for (let i = 0; i < header.count; i++) {
          const id = input.readUuid();
          if (tree.deleteEntity(id)) erased.push(id);
          else deleted.set(id, env.now());
        }
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        env.logger.warn('Stopped reading erase packet', { erased: erased.length, error: err.message });
        return { erased, error: err };
      }
      return { erased, error: null };
    },

    deletedSince(time) {
      const ids: EntityId[] = [];
      for (const [id, at] of deleted) {
        if (at > time) ids.push(id);
      }
      return ids;
    },

    pruneDeletedEntities() {
      const now = env.now();
      let pruned = 0;
      for (const [id, at] of deleted) {
        if (now - at > env.rememberDeletedEntityTime) {
          deleted.delete(id);
          pruned++;
        }
      }
      return pruned;
    },
  };

  /**
   * Applies one record at the start of `bytes`; returns its length.
   * Unknown ids become new entities unless they were deleted here.
   */
  function readRecord(bytes: Uint8Array, version: number, clockSkew: number, result: ReadPacketResult): number {
    const id = peekEntityId(bytes);
    const existing = entities.get(id);

    if (existing) {
      const consumed = readEntityDataFromBuffer(existing, bytes, { version, clockSkew, spatialIndex: tree });
      if (consumed === 0) throw new DecodeError(`Unreadable record for entity ${id}`, 0);
      result.applied++;
      return consumed;
    }

    // parse first: a malformed record must not leave a half-built entity behind
    const { record, bytesRead } = decodeEntityRecord(bytes, version);
    if (deleted.has(id)) {
      env.logger.debug('Skipping record for deleted entity', { entity: id });
      return bytesRead;
    }

    const entity = new EntityItem(env, { id, type: record.type, actionFactory });
    insert(entity);
    const consumed = readEntityDataFromBuffer(entity, bytes, { version, clockSkew, spatialIndex: tree });
    if (consumed === 0) {
      release(entity);
      entity.destroy(simulation);
      throw new DecodeError(`Unreadable record for new entity ${id}`, 0);
    }
    result.applied++;
    result.created.push(id);
    return consumed;
  }

  return tree;
}

function u16(value: number): Uint8Array {
  return Uint8Array.of(value & 0xFF, (value >> 8) & 0xFF);
}

function startPacket(type: number, version: number, capacity: number): EntityPacketData {
  const packet = new EntityPacketData(capacity);
  const out = new ProtocolEncoder(PACKET_HEADER_BYTES);
  writePacketHeader(out, { type, version, count: 0 });
  packet.appendBytes(out.finishBytes());
  return packet;
}
