import type { ActionSimulation } from './EntityAction.js';
import type { EntityItem } from './EntityItem.js';
import type { AACube, Quat, Vec3 } from './math.js';
import type { ProtocolDecoder, ProtocolEncoder } from './Protocol.js';
import { PropertyFlags } from './PropertyFlags.js';
import type { SimulationOwnerData } from './SimulationOwner.js';
import { SimulationOwner } from './SimulationOwner.js';
import type { EntityId } from './types.js';
import {
  VERSION_ENTITIES_HAS_MARKETPLACE_ID,
  VERSION_ENTITIES_HAS_PARENT,
  VERSION_ENTITIES_HAS_QUERY_AA_CUBE,
  VERSION_ENTITIES_SUPPORT_SPLIT_MTU,
} from './types.js';

// ── Property values ─────────────────────────────────────

export interface EntityPropertyValues {
  simulationOwner: SimulationOwnerData;
  position: Vec3;
  rotation: Quat;
  velocity: Vec3;
  angularVelocity: Vec3;
  acceleration: Vec3;
  dimensions: Vec3;
  density: number;
  gravity: Vec3;
  damping: number;
  restitution: number;
  friction: number;
  /** Seconds; negative means immortal */
  lifetime: number;
  script: string;
  scriptTimestamp: number;
  registrationPoint: Vec3;
  angularDamping: number;
  visible: boolean;
  collisionless: boolean;
  collisionMask: number;
  dynamic: boolean;
  locked: boolean;
  userData: string;
  marketplaceId: string;
  name: string;
  collisionSoundUrl: string;
  href: string;
  description: string;
  actionData: Uint8Array;
  parentId: EntityId;
  parentJointIndex: number;
  queryAACube: AACube;
}

export type PropertyName = keyof EntityPropertyValues;

/** A subset of properties, as decoded from a record or passed to a local edit */
export type EntityPropertyDelta = Partial<EntityPropertyValues>;

// ── Tags ────────────────────────────────────────────────
// Append-only. A tag is the property's position in the canonical order.

export const PROP_SIMULATION_OWNER = 0;
export const PROP_POSITION = 1;
export const PROP_ROTATION = 2;
export const PROP_VELOCITY = 3;
export const PROP_ANGULAR_VELOCITY = 4;
export const PROP_ACCELERATION = 5;
export const PROP_DIMENSIONS = 6;
export const PROP_DENSITY = 7;
export const PROP_GRAVITY = 8;
export const PROP_DAMPING = 9;
export const PROP_RESTITUTION = 10;
export const PROP_FRICTION = 11;
export const PROP_LIFETIME = 12;
export const PROP_SCRIPT = 13;
export const PROP_SCRIPT_TIMESTAMP = 14;
export const PROP_REGISTRATION_POINT = 15;
export const PROP_ANGULAR_DAMPING = 16;
export const PROP_VISIBLE = 17;
export const PROP_COLLISIONLESS = 18;
export const PROP_COLLISION_MASK = 19;
export const PROP_DYNAMIC = 20;
export const PROP_LOCKED = 21;
export const PROP_USER_DATA = 22;
export const PROP_MARKETPLACE_ID = 23;
export const PROP_NAME = 24;
export const PROP_COLLISION_SOUND_URL = 25;
export const PROP_HREF = 26;
export const PROP_DESCRIPTION = 27;
export const PROP_ACTION_DATA = 28;
export const PROP_PARENT_ID = 29;
export const PROP_PARENT_JOINT_INDEX = 30;
export const PROP_QUERY_AA_CUBE = 31;

// ── Table entries ───────────────────────────────────────

/**
 * always: applied on every ingest, accepted or not.
 * simulation: applied only when accepted and the receiver does not simulate the entity.
 * edit: applied only when accepted.
 */
export type PropertyGate = 'always' | 'simulation' | 'edit';

export interface EntityPropertyEntry {
  readonly tag: number;
  readonly name: PropertyName;
  /** First wire version carrying the property */
  readonly sinceVersion: number;
  readonly gate: PropertyGate;
  encode(out: ProtocolEncoder, values: EntityPropertyValues): void;
  decode(input: ProtocolDecoder, into: EntityPropertyDelta): void;
  /** Applies the property if the delta carries it; false when absent */
  apply(entity: EntityItem, delta: EntityPropertyDelta, simulation: ActionSimulation | null): boolean;
}

function writeVec3(out: ProtocolEncoder, v: Vec3) {
  out.writeF32(v.x);
  out.writeF32(v.y);
  out.writeF32(v.z);
}

function readVec3(input: ProtocolDecoder): Vec3 {
  const x = input.readF32();
  const y = input.readF32();
  const z = input.readF32();
  return { x, y, z };
}

function writeQuat(out: ProtocolEncoder, q: Quat) {
  out.writeF32(q.x);
  out.writeF32(q.y);
  out.writeF32(q.z);
  out.writeF32(q.w);
}

function readQuat(input: ProtocolDecoder): Quat {
  const x = input.readF32();
  const y = input.readF32();
  const z = input.readF32();
  const w = input.readF32();
  return { x, y, z, w };
}

function writeCube(out: ProtocolEncoder, cube: AACube) {
  writeVec3(out, cube.corner);
  out.writeF32(cube.scale);
}

function readCube(input: ProtocolDecoder): AACube {
  const corner = readVec3(input);
  const scale = input.readF32();
  return { corner, scale };
}

function applyIf<T>(value: T | undefined, set: (value: T) => void): boolean {
  if (value === undefined) return false;
  set(value);
  return true;
}

const V1 = VERSION_ENTITIES_SUPPORT_SPLIT_MTU;

export const ENTITY_PROPERTIES: readonly EntityPropertyEntry[] = [
  {
    tag: PROP_SIMULATION_OWNER, name: 'simulationOwner', sinceVersion: V1, gate: 'always',
    encode: (out, p) => out.writeBytes(new SimulationOwner(p.simulationOwner.id, p.simulationOwner.priority).toBytes()),
    decode: (input, d) => { d.simulationOwner = SimulationOwner.fromBytes(input.readBytes()).toData(); },
    apply: (e, d) => applyIf(d.simulationOwner, (v) => e.updateSimulationOwner(v)),
  },
  {
    tag: PROP_POSITION, name: 'position', sinceVersion: V1, gate: 'simulation',
    encode: (out, p) => writeVec3(out, p.position),
    decode: (input, d) => { d.position = readVec3(input); },
    apply: (e, d) => applyIf(d.position, (v) => e.updatePosition(v)),
  },
  {
    tag: PROP_ROTATION, name: 'rotation', sinceVersion: V1, gate: 'simulation',
    encode: (out, p) => writeQuat(out, p.rotation),
    decode: (input, d) => { d.rotation = readQuat(input); },
    apply: (e, d) => applyIf(d.rotation, (v) => e.updateRotation(v)),
  },
  {
    tag: PROP_VELOCITY, name: 'velocity', sinceVersion: V1, gate: 'simulation',
    encode: (out, p) => writeVec3(out, p.velocity),
    decode: (input, d) => { d.velocity = readVec3(input); },
    apply: (e, d) => applyIf(d.velocity, (v) => e.updateVelocity(v)),
  },
  {
    tag: PROP_ANGULAR_VELOCITY, name: 'angularVelocity', sinceVersion: V1, gate: 'simulation',
    encode: (out, p) => writeVec3(out, p.angularVelocity),
    decode: (input, d) => { d.angularVelocity = readVec3(input); },
    apply: (e, d) => applyIf(d.angularVelocity, (v) => e.updateAngularVelocity(v)),
  },
  {
    tag: PROP_ACCELERATION, name: 'acceleration', sinceVersion: V1, gate: 'simulation',
    encode: (out, p) => writeVec3(out, p.acceleration),
    decode: (input, d) => { d.acceleration = readVec3(input); },
    apply: (e, d) => applyIf(d.acceleration, (v) => e.setAcceleration(v)),
  },
  {
    tag: PROP_DIMENSIONS, name: 'dimensions', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => writeVec3(out, p.dimensions),
    decode: (input, d) => { d.dimensions = readVec3(input); },
    apply: (e, d) => applyIf(d.dimensions, (v) => e.updateDimensions(v)),
  },
  {
    tag: PROP_DENSITY, name: 'density', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeF32(p.density),
    decode: (input, d) => { d.density = input.readF32(); },
    apply: (e, d) => applyIf(d.density, (v) => e.updateDensity(v)),
  },
  {
    tag: PROP_GRAVITY, name: 'gravity', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => writeVec3(out, p.gravity),
    decode: (input, d) => { d.gravity = readVec3(input); },
    apply: (e, d) => applyIf(d.gravity, (v) => e.updateGravity(v)),
  },
  {
    tag: PROP_DAMPING, name: 'damping', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeF32(p.damping),
    decode: (input, d) => { d.damping = input.readF32(); },
    apply: (e, d) => applyIf(d.damping, (v) => e.updateDamping(v)),
  },
  {
    tag: PROP_RESTITUTION, name: 'restitution', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeF32(p.restitution),
    decode: (input, d) => { d.restitution = input.readF32(); },
    apply: (e, d) => applyIf(d.restitution, (v) => e.updateRestitution(v)),
  },
  {
    tag: PROP_FRICTION, name: 'friction', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeF32(p.friction),
    decode: (input, d) => { d.friction = input.readF32(); },
    apply: (e, d) => applyIf(d.friction, (v) => e.updateFriction(v)),
  },
  {
    tag: PROP_LIFETIME, name: 'lifetime', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeF32(p.lifetime),
    decode: (input, d) => { d.lifetime = input.readF32(); },
    apply: (e, d) => applyIf(d.lifetime, (v) => e.updateLifetime(v)),
  },
  {
    tag: PROP_SCRIPT, name: 'script', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeString(p.script),
    decode: (input, d) => { d.script = input.readString(); },
    apply: (e, d) => applyIf(d.script, (v) => { e.script = v; }),
  },
  {
    tag: PROP_SCRIPT_TIMESTAMP, name: 'scriptTimestamp', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeU64(p.scriptTimestamp),
    decode: (input, d) => { d.scriptTimestamp = input.readU64(); },
    apply: (e, d) => applyIf(d.scriptTimestamp, (v) => { e.scriptTimestamp = v; }),
  },
  {
    tag: PROP_REGISTRATION_POINT, name: 'registrationPoint', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => writeVec3(out, p.registrationPoint),
    decode: (input, d) => { d.registrationPoint = readVec3(input); },
    apply: (e, d) => applyIf(d.registrationPoint, (v) => e.setRegistrationPoint(v)),
  },
  {
    tag: PROP_ANGULAR_DAMPING, name: 'angularDamping', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeF32(p.angularDamping),
    decode: (input, d) => { d.angularDamping = input.readF32(); },
    apply: (e, d) => applyIf(d.angularDamping, (v) => e.updateAngularDamping(v)),
  },
  {
    tag: PROP_VISIBLE, name: 'visible', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeBool(p.visible),
    decode: (input, d) => { d.visible = input.readBool(); },
    apply: (e, d) => applyIf(d.visible, (v) => { e.visible = v; }),
  },
  {
    tag: PROP_COLLISIONLESS, name: 'collisionless', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeBool(p.collisionless),
    decode: (input, d) => { d.collisionless = input.readBool(); },
    apply: (e, d) => applyIf(d.collisionless, (v) => e.updateCollisionless(v)),
  },
  {
    tag: PROP_COLLISION_MASK, name: 'collisionMask', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeU8(p.collisionMask),
    decode: (input, d) => { d.collisionMask = input.readU8(); },
    apply: (e, d) => applyIf(d.collisionMask, (v) => e.updateCollisionMask(v)),
  },
  {
    tag: PROP_DYNAMIC, name: 'dynamic', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeBool(p.dynamic),
    decode: (input, d) => { d.dynamic = input.readBool(); },
    apply: (e, d) => applyIf(d.dynamic, (v) => e.updateDynamic(v)),
  },
  {
    tag: PROP_LOCKED, name: 'locked', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeBool(p.locked),
    decode: (input, d) => { d.locked = input.readBool(); },
    apply: (e, d) => applyIf(d.locked, (v) => { e.locked = v; }),
  },
  {
    tag: PROP_USER_DATA, name: 'userData', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeString(p.userData),
    decode: (input, d) => { d.userData = input.readString(); },
    apply: (e, d) => applyIf(d.userData, (v) => { e.userData = v; }),
  },
  {
    tag: PROP_MARKETPLACE_ID, name: 'marketplaceId', sinceVersion: VERSION_ENTITIES_HAS_MARKETPLACE_ID, gate: 'edit',
    encode: (out, p) => out.writeString(p.marketplaceId),
    decode: (input, d) => { d.marketplaceId = input.readString(); },
    apply: (e, d) => applyIf(d.marketplaceId, (v) => { e.marketplaceId = v; }),
  },
  {
    tag: PROP_NAME, name: 'name', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeString(p.name),
    decode: (input, d) => { d.name = input.readString(); },
    apply: (e, d) => applyIf(d.name, (v) => { e.name = v; }),
  },
  {
    tag: PROP_COLLISION_SOUND_URL, name: 'collisionSoundUrl', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeString(p.collisionSoundUrl),
    decode: (input, d) => { d.collisionSoundUrl = input.readString(); },
    apply: (e, d) => applyIf(d.collisionSoundUrl, (v) => { e.collisionSoundUrl = v; }),
  },
  {
    tag: PROP_HREF, name: 'href', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeString(p.href),
    decode: (input, d) => { d.href = input.readString(); },
    apply: (e, d) => applyIf(d.href, (v) => e.setHref(v)),
  },
  {
    tag: PROP_DESCRIPTION, name: 'description', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeString(p.description),
    decode: (input, d) => { d.description = input.readString(); },
    apply: (e, d) => applyIf(d.description, (v) => { e.description = v; }),
  },
  {
    tag: PROP_ACTION_DATA, name: 'actionData', sinceVersion: V1, gate: 'edit',
    encode: (out, p) => out.writeBytes(p.actionData),
    decode: (input, d) => { d.actionData = input.readBytes(); },
    apply: (e, d, sim) => applyIf(d.actionData, (v) => e.setActionData(sim, v)),
  },
  {
    tag: PROP_PARENT_ID, name: 'parentId', sinceVersion: VERSION_ENTITIES_HAS_PARENT, gate: 'edit',
    encode: (out, p) => out.writeUuid(p.parentId),
    decode: (input, d) => { d.parentId = input.readUuid(); },
    apply: (e, d) => applyIf(d.parentId, (v) => { e.parentId = v; }),
  },
  {
    tag: PROP_PARENT_JOINT_INDEX, name: 'parentJointIndex', sinceVersion: VERSION_ENTITIES_HAS_PARENT, gate: 'edit',
    encode: (out, p) => out.writeU16(p.parentJointIndex),
    decode: (input, d) => { d.parentJointIndex = input.readU16(); },
    apply: (e, d) => applyIf(d.parentJointIndex, (v) => { e.parentJointIndex = v; }),
  },
  {
    tag: PROP_QUERY_AA_CUBE, name: 'queryAACube', sinceVersion: VERSION_ENTITIES_HAS_QUERY_AA_CUBE, gate: 'edit',
    encode: (out, p) => writeCube(out, p.queryAACube),
    decode: (input, d) => { d.queryAACube = readCube(input); },
    apply: (e, d) => applyIf(d.queryAACube, (v) => e.setQueryAACube(v)),
  },
];

export const PROPERTY_COUNT = ENTITY_PROPERTIES.length;

/** Every property a peer speaking `version` can read. */
export function propertiesForVersion(version: number): PropertyFlags {
  const flags = new PropertyFlags();
  for (const entry of ENTITY_PROPERTIES) {
    if (entry.sinceVersion <= version) flags.add(entry.tag);
  }
  return flags;
}

export function propertyByName(name: PropertyName): EntityPropertyEntry {
  const entry = ENTITY_PROPERTIES.find((e) => e.name === name);
  if (!entry) throw new Error(`Unknown property "${name}"`);
  return entry;
}

/** Flags for the named properties */
export function flagsFor(...names: PropertyName[]): PropertyFlags {
  return PropertyFlags.of(...names.map((name) => propertyByName(name).tag));
}
