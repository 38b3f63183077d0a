import type { Logger } from './Logger.js';

// ── Identity ────────────────────────────────────────────

/** Canonical lowercase RFC 4122 string, 16 bytes on the wire */
export type EntityId = string;

export const NULL_ID: EntityId = '00000000-0000-0000-0000-000000000000';

export type ClientId = number;

// ── Time ────────────────────────────────────────────────

/** All timestamps are microseconds since the epoch */
export const USECS_PER_SECOND = 1_000_000;
export const UNKNOWN_CREATED_TIME = 0;

// ── Config ──────────────────────────────────────────────

export interface EntityEnvironmentOptions {
  /** This peer's node id. Ownership records carrying it mean "we simulate this entity". */
  sessionId?: EntityId;
  /** Microsecond clock. Default usecTimestampNow(). */
  now?: () => number;
  /** Serialized action data must stay below this many bytes. Default 800. */
  maxActionsDataSize?: number;
  /** How long (µs) a removed action id blocks re-creation from stale data. Default 20 s. */
  rememberDeletedActionTime?: number;
  /** How long (µs) a deleted entity id rejects late packets. Default 60 s. */
  rememberDeletedEntityTime?: number;
  logger?: Logger;
}

export interface EntityEnvironment {
  readonly sessionId: EntityId;
  now(): number;
  readonly maxActionsDataSize: number;
  readonly rememberDeletedActionTime: number;
  readonly rememberDeletedEntityTime: number;
  readonly logger: Logger;
}

export interface EntityServerConfig {
  port: number;
  /** Byte budget of one entity data packet, header included. Default 1400. */
  maxPacketSize?: number;
  /** Wire version written to clients. Default CURRENT_PROTOCOL_VERSION. */
  protocolVersion?: number;
}

// ── Wire versions ───────────────────────────────────────
// Append-only: a field introduced at version N is never read for packets < N.

export const VERSION_ENTITIES_SUPPORT_SPLIT_MTU = 1;
export const VERSION_ENTITIES_HAS_LAST_SIMULATED_TIME = 2;
export const VERSION_ENTITIES_HAS_MARKETPLACE_ID = 3;
export const VERSION_ENTITIES_HAS_PARENT = 4;
export const VERSION_ENTITIES_HAS_QUERY_AA_CUBE = 5;
export const CURRENT_PROTOCOL_VERSION = VERSION_ENTITIES_HAS_QUERY_AA_CUBE;

// ── Packet types ────────────────────────────────────────

export const MSG_ENTITY_DATA = 0x10;
export const MSG_ENTITY_ERASE = 0x11;

/** type (u8) + version (u16) + record count (u16) */
export const PACKET_HEADER_BYTES = 5;

// ── Entity types ────────────────────────────────────────

export const EntityTypes = {
  Unknown: 0,
  Box: 1,
  Sphere: 2,
  Model: 3,
  Light: 4,
  Text: 5,
  Zone: 6,
  Line: 7,
  ParticleEffect: 8,
  Web: 9,
} as const;

/** Known tags plus any tag a newer peer may introduce */
export type EntityType = number;

// ── Simulation dirty flags ──────────────────────────────
// Polled and cleared by the simulation scheduler.

export const DIRTY_POSITION = 0x0001;
export const DIRTY_ROTATION = 0x0002;
export const DIRTY_LINEAR_VELOCITY = 0x0004;
export const DIRTY_ANGULAR_VELOCITY = 0x0008;
export const DIRTY_MASS = 0x0010;
export const DIRTY_COLLISION_GROUP = 0x0020;
export const DIRTY_MOTION_TYPE = 0x0040;
export const DIRTY_SHAPE = 0x0080;
export const DIRTY_LIFETIME = 0x0100;
export const DIRTY_MATERIAL = 0x0200;
export const DIRTY_PHYSICS_ACTIVATION = 0x0400;
export const DIRTY_SIMULATOR_ID = 0x0800;

export const DIRTY_TRANSFORM = DIRTY_POSITION | DIRTY_ROTATION;
export const DIRTY_VELOCITIES = DIRTY_LINEAR_VELOCITY | DIRTY_ANGULAR_VELOCITY;
export const DIRTY_ALL = 0x0FFF;
