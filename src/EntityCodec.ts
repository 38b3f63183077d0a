import type { EncodeContinuation } from './EncodeContinuation.js';
import type { ActionSimulation } from './EntityAction.js';
import type { EntityItem } from './EntityItem.js';
import type { EntityPropertyDelta } from './EntityProperties.js';
import { ENTITY_PROPERTIES, PROPERTY_COUNT, propertiesForVersion } from './EntityProperties.js';
import type { SpatialIndex } from './EntityTree.js';
import { DecodeError } from './errors.js';
import type { EntityPacketData } from './PacketData.js';
import { ProtocolDecoder, ProtocolEncoder } from './Protocol.js';
import { PropertyFlags } from './PropertyFlags.js';
import { adjustCreatedTime, deriveFromDelta, encodeDelta, reconcileRemoteEdit } from './TimestampReconciler.js';
import type { EntityId, EntityType } from './types.js';
import {
  CURRENT_PROTOCOL_VERSION,
  DIRTY_TRANSFORM,
  DIRTY_VELOCITIES,
  USECS_PER_SECOND,
  VERSION_ENTITIES_HAS_LAST_SIMULATED_TIME,
  VERSION_ENTITIES_SUPPORT_SPLIT_MTU,
} from './types.js';
import { bytesToUuid, UUID_BYTES } from './uuid.js';

/** id + one-byte type + created + lastEdited + one-byte update delta + one flags byte */
export const MINIMUM_HEADER_BYTES = UUID_BYTES + 1 + 8 + 8 + 1 + 1;

// ── Encode ──────────────────────────────────────────────

export type AppendState = 'completed' | 'partial' | 'none';

export interface EncodeParams {
  /** Receiver's wire version. Default CURRENT_PROTOCOL_VERSION. */
  version?: number;
  /** Properties wanted. Default: all the receiver can read. */
  requested?: PropertyFlags;
  /** Supplies the pending set and receives the remainder */
  continuation?: EncodeContinuation | null;
  /** Called whenever any part of the record was written */
  trackSend?: (id: EntityId, lastEdited: number) => void;
}

export interface EncodeResult {
  state: AppendState;
  bytesWritten: number;
  included: PropertyFlags;
  didntFit: PropertyFlags;
}

function encodeHeader(entity: EntityItem, version: number): Uint8Array {
  const out = new ProtocolEncoder(64);
  out.writeUuid(entity.id);
  out.writeVarint(entity.type);
  out.writeU64(entity.created);
  out.writeU64(entity.lastEdited);
  out.writeVarint(encodeDelta(entity.lastEdited, entity.lastUpdated));
  if (version >= VERSION_ENTITIES_HAS_LAST_SIMULATED_TIME) {
    out.writeVarint(encodeDelta(entity.lastEdited, entity.lastSimulated));
  }
  return out.finishBytes();
}

/**
 * Appends one entity record to `packet`.
 *
 * The flags field is reserved at the size of the requested set, properties
 * are appended in canonical order while they fit, then the flags are
 * rewritten with what was actually included and the field shrunk in place.
 */
export function encodeEntityRecord(entity: EntityItem, packet: EntityPacketData, params: EncodeParams = {}): EncodeResult {
  const version = params.version ?? CURRENT_PROTOCOL_VERSION;
  const readable = propertiesForVersion(version);
  const wanted = (params.requested ?? readable).intersect(readable);
  const requested = params.continuation
    ? params.continuation.pendingFor(entity.id, wanted).intersect(readable)
    : wanted;

  const included = new PropertyFlags();
  if (requested.isEmpty()) {
    params.continuation?.complete(entity.id);
    return { state: 'completed', bytesWritten: 0, included, didntFit: new PropertyFlags() };
  }
  const level = packet.startLevel();

  const header = encodeHeader(entity, version);
  const reserved = requested.encode();
  const headerFits = packet.appendBytes(header);
  const flagsOffset = packet.length;
  if (!headerFits || !packet.appendBytes(reserved)) {
    packet.discardLevel(level);
    params.continuation?.store(entity.id, requested);
    return { state: 'none', bytesWritten: 0, included, didntFit: requested };
  }

  const values = entity.getProperties();
  const scratch = new ProtocolEncoder();
  for (const entry of ENTITY_PROPERTIES) {
    if (!requested.has(entry.tag)) continue;
    scratch.reset();
    entry.encode(scratch, values);
    if (packet.appendBytes(scratch.finishBytes())) included.add(entry.tag);
  }

  if (included.isEmpty()) {
    packet.discardLevel(level);
    params.continuation?.store(entity.id, requested);
    return { state: 'none', bytesWritten: 0, included, didntFit: requested };
  }

  const actualFlags = included.encode();
  packet.updatePriorBytes(flagsOffset, actualFlags);
  packet.removeBytes(flagsOffset + actualFlags.byteLength, reserved.byteLength - actualFlags.byteLength);

  const didntFit = requested.minus(included);
  const state: AppendState = didntFit.isEmpty() ? 'completed' : 'partial';
  if (params.continuation) {
    if (state === 'completed') params.continuation.complete(entity.id);
    else params.continuation.store(entity.id, didntFit);
  }
  params.trackSend?.(entity.id, entity.lastEdited);

  return { state, bytesWritten: packet.length - level, included, didntFit };
}

// ── Decode ──────────────────────────────────────────────

export interface EntityRecordHeader {
  id: EntityId;
  type: EntityType;
  created: number;
  lastEdited: number;
  updateDelta: number;
  /** null for versions without it */
  simulatedDelta: number | null;
}

export interface DecodedEntityRecord extends EntityRecordHeader {
  /** Flags as carried on the wire */
  flags: PropertyFlags;
  properties: EntityPropertyDelta;
}

/**
 * Parses one record without touching any entity. Throws DecodeError on
 * truncation, malformed counts or flags naming unknown properties.
 */
export function decodeEntityRecord(
  bytes: Uint8Array,
  version: number,
  offset = 0,
): { record: DecodedEntityRecord; bytesRead: number } {
  const input = new ProtocolDecoder(bytes, offset);
  const id = input.readUuid();
  const type = input.readVarint();
  const created = input.readU64();
  const lastEdited = input.readU64();
  const updateDelta = input.readVarint();
  const simulatedDelta = version >= VERSION_ENTITIES_HAS_LAST_SIMULATED_TIME ? input.readVarint() : null;

  const flagsAt = input.position;
  const flags = input.readFlags();
  for (const tag of flags) {
    if (tag >= PROPERTY_COUNT) throw new DecodeError(`Unknown property tag ${tag}`, flagsAt);
  }

  const properties: EntityPropertyDelta = {};
  for (const entry of ENTITY_PROPERTIES) {
    // a flag for a property newer than the packet's version carries no payload
    if (flags.has(entry.tag) && entry.sinceVersion <= version) entry.decode(input, properties);
  }

  return {
    record: { id, type, created, lastEdited, updateDelta, simulatedDelta, flags, properties },
    bytesRead: input.position - offset,
  };
}

export function peekEntityId(bytes: Uint8Array, offset = 0): EntityId {
  return bytesToUuid(bytes, offset);
}

export interface ReadEntityArgs {
  /** Sender's wire version */
  version: number;
  /** Sender clock minus receiver clock, µs */
  clockSkew?: number;
  spatialIndex?: SpatialIndex | null;
  /** Where received actions go. Default: the index's simulation for the entity. */
  simulation?: ActionSimulation | null;
}

/**
 * Reads one record into `entity`. Returns the bytes consumed, or 0 when the
 * record is unusable (older than split-MTU packets, short of a header,
 * truncated, malformed or for a different entity); nothing is applied then.
 */
export function readEntityDataFromBuffer(entity: EntityItem, bytes: Uint8Array, args: ReadEntityArgs): number {
  const { logger } = entity.env;
  if (args.version < VERSION_ENTITIES_SUPPORT_SPLIT_MTU) return 0;
  if (bytes.byteLength < MINIMUM_HEADER_BYTES) return 0;

  let decoded: { record: DecodedEntityRecord; bytesRead: number };
  try {
    decoded = decodeEntityRecord(bytes, args.version);
  } catch (err) {
    if (!(err instanceof DecodeError)) throw err;
    logger.warn('Dropped malformed entity record', { entity: entity.id, error: err.message });
    return 0;
  }
  const { record, bytesRead } = decoded;
  if (record.id !== entity.id) {
    logger.warn('Entity record applied to the wrong entity', { entity: entity.id, record: record.id });
    return 0;
  }

  const now = entity.env.now();
  const clockSkew = args.clockSkew ?? 0;
  const index = args.spatialIndex ?? null;

  entity.created = adjustCreatedTime(entity.created, record.created, clockSkew, now);

  const deleted = index ? index.isDeletedEntity(entity.id) : false;
  if (deleted) logger.debug('Ignoring packet for deleted entity', { entity: entity.id });

  const decision = reconcileRemoteEdit({
    remoteLastEdited: record.lastEdited,
    clockSkew,
    now,
    localLastEdited: entity.lastEdited,
    lastEditedFromRemote: entity.lastEditedFromRemote,
    lastEditedFromRemoteInRemoteTime: entity.lastEditedFromRemoteInRemoteTime,
    deleted,
  });

  let lastSimulatedAdjusted = now;
  if (decision.accept) {
    entity.lastEdited = decision.lastEditedAdjusted;
    entity.lastEditedFromRemote = now;
    entity.lastEditedFromRemoteInRemoteTime = record.lastEdited;
    entity.lastUpdated = deriveFromDelta(decision.lastEditedAdjusted, record.updateDelta, now);
    if (record.simulatedDelta !== null) {
      lastSimulatedAdjusted = deriveFromDelta(decision.lastEditedAdjusted, record.simulatedDelta, now);
    }
  }

  // ownership as it was before this packet decides who may move the entity
  const weOwnSimulation = entity.weOwnSimulation();
  const simulation = args.simulation ?? index?.simulationFor(entity.id) ?? null;

  const moved = entity.collectRaisedFlags(DIRTY_TRANSFORM | DIRTY_VELOCITIES, () => {
    for (const entry of ENTITY_PROPERTIES) {
      const allowed = entry.gate === 'always'
        || (decision.accept && (entry.gate === 'edit' || !weOwnSimulation));
      if (allowed) entry.apply(entity, record.properties, simulation);
    }
  });

  // our own simulation is never advanced by someone else's packet
  if (decision.accept && moved && !weOwnSimulation) {
    entity.simulateKinematicMotion((now - lastSimulatedAdjusted) / USECS_PER_SECOND, false);
  }
  if (decision.accept && !entity.weOwnSimulation()) {
    entity.lastSimulated = now;
  }

  index?.trackIncomingEntityLastEdited(decision.lastEditedAdjusted, bytesRead);
  return bytesRead;
}

/**
 * Copy of an outgoing edit record with lastEdited moved into the receiver's
 * clock. `clockSkew` is receiver clock minus ours; an unset (0) time stays 0.
 * Throws DecodeError when the record is too short to hold the field.
 */
export function adjustEditPacketForClockSkew(record: Uint8Array, clockSkew: number): Uint8Array {
  const out = record.slice();
  const input = new ProtocolDecoder(out, UUID_BYTES);
  input.readVarint();
  input.readU64();
  const at = input.position;
  const lastEdited = input.readU64();
  if (lastEdited === 0) return out;

  const adjusted = Math.max(0, lastEdited + clockSkew);
  new DataView(out.buffer, out.byteOffset, out.byteLength).setBigUint64(at, BigInt(adjusted), true);
  return out;
}
