import { ActionLedger } from './ActionLedger.js';
import type { ActionArguments, ActionFactory, ActionSimulation, EntityAction } from './EntityAction.js';
import type { EntityPropertyDelta, EntityPropertyValues } from './EntityProperties.js';
import { ENTITY_PROPERTIES } from './EntityProperties.js';
import { simulateKinematicMotion as integrate } from './KinematicMotion.js';
import type { AABox, AACube, Quat, Transform, Vec3 } from './math.js';
import {
  clamp,
  quatClone,
  quatConjugate,
  quatEquals,
  quatIdentity,
  quatRotateVec3,
  rotatedExtents,
  vec3,
  vec3Add,
  vec3Clone,
  vec3Div,
  vec3Equals,
  vec3IsZero,
  vec3Length,
  vec3Max,
  vec3Mul,
  vec3Sub,
} from './math.js';
import type { SimulationOwnerData } from './SimulationOwner.js';
import { SimulationOwner } from './SimulationOwner.js';
import type { EntityEnvironment, EntityId, EntityType } from './types.js';
import {
  DIRTY_ALL,
  DIRTY_ANGULAR_VELOCITY,
  DIRTY_COLLISION_GROUP,
  DIRTY_LIFETIME,
  DIRTY_LINEAR_VELOCITY,
  DIRTY_MASS,
  DIRTY_MATERIAL,
  DIRTY_MOTION_TYPE,
  DIRTY_POSITION,
  DIRTY_ROTATION,
  DIRTY_SHAPE,
  DIRTY_SIMULATOR_ID,
  DIRTY_TRANSFORM,
  DIRTY_VELOCITIES,
  EntityTypes,
  NULL_ID,
  UNKNOWN_CREATED_TIME,
  USECS_PER_SECOND,
} from './types.js';

// ── Defaults and limits ─────────────────────────────────

export const ENTITY_ITEM_MIN_DENSITY = 100;
export const ENTITY_ITEM_MAX_DENSITY = 10000;
export const ENTITY_ITEM_DEFAULT_DENSITY = 1000;
export const ENTITY_ITEM_MIN_RESTITUTION = 0;
export const ENTITY_ITEM_MAX_RESTITUTION = 0.99;
export const ENTITY_ITEM_DEFAULT_RESTITUTION = 0.5;
export const ENTITY_ITEM_MIN_FRICTION = 0;
export const ENTITY_ITEM_MAX_FRICTION = 10;
export const ENTITY_ITEM_DEFAULT_FRICTION = 0.5;
export const ENTITY_ITEM_DEFAULT_DAMPING = 0.39;
export const ENTITY_ITEM_DEFAULT_ANGULAR_DAMPING = 0.39;
export const ENTITY_ITEM_IMMORTAL_LIFETIME = -1;
export const ENTITY_ITEM_DEFAULT_DIMENSIONS = 0.1;
export const ENTITY_COLLISION_MASK_DEFAULT = 0x1F;
/** 0xFFFF: not attached to a joint */
export const ENTITY_ITEM_NO_JOINT = 0xFFFF;

/** 0.001 mm³ */
const MIN_VOLUME = 1e-6;
const MIN_LINEAR_SPEED = 0.001;
const MIN_ANGULAR_SPEED = 0.0002;

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;

// ── Collision groups ────────────────────────────────────
// The low five bits double as the user-facing `collisionMask` layout.

export const COLLISION_GROUP_DYNAMIC = 1 << 0;
export const COLLISION_GROUP_STATIC = 1 << 1;
export const COLLISION_GROUP_KINEMATIC = 1 << 2;
export const COLLISION_GROUP_MY_AVATAR = 1 << 3;
export const COLLISION_GROUP_OTHER_AVATAR = 1 << 4;
export const COLLISION_GROUP_COLLISIONLESS = 1 << 14;
export const COLLISION_MASK_AVATARS = COLLISION_GROUP_MY_AVATAR | COLLISION_GROUP_OTHER_AVATAR;

export interface CollisionGroupAndMask {
  group: number;
  mask: number;
}

/** Groups a body in `group` collides with before the entity's own mask applies */
export function defaultCollisionMask(group: number): number {
  switch (group) {
    case COLLISION_GROUP_COLLISIONLESS:
      return 0;
    case COLLISION_GROUP_STATIC:
    case COLLISION_GROUP_KINEMATIC:
      return ENTITY_COLLISION_MASK_DEFAULT & ~COLLISION_GROUP_STATIC;
    default:
      return ENTITY_COLLISION_MASK_DEFAULT;
  }
}

export interface EntityItemOptions {
  id: EntityId;
  type?: EntityType;
  /** Builds actions named by received action data */
  actionFactory?: ActionFactory | null;
}

/** A local edit: any subset of properties, plus an optional creation time */
export type EntityEdit = EntityPropertyDelta & { created?: number };

/**
 * One replicated object: timestamps, transform, motion state, behavioural
 * fields, simulation ownership and attached actions.
 *
 * `update*` setters raise simulation dirty flags when the value changes;
 * `set*` setters do not.
 */
export class EntityItem {
  readonly id: EntityId;
  readonly type: EntityType;

  // ── Timestamps (µs) ───────────────────────────────────
  created = UNKNOWN_CREATED_TIME;
  lastEdited = 0;
  lastUpdated: number;
  lastSimulated: number;
  lastEditedFromRemote = 0;
  lastEditedFromRemoteInRemoteTime = 0;

  // ── Behaviour ─────────────────────────────────────────
  script = '';
  scriptTimestamp = 0;
  visible = true;
  locked = false;
  userData = '';
  marketplaceId = '';
  name = '';
  collisionSoundUrl = '';
  description = '';
  parentId: EntityId = NULL_ID;
  parentJointIndex = ENTITY_ITEM_NO_JOINT;

  private _position = vec3();
  private _rotation = quatIdentity();
  private _dimensions = vec3(ENTITY_ITEM_DEFAULT_DIMENSIONS, ENTITY_ITEM_DEFAULT_DIMENSIONS, ENTITY_ITEM_DEFAULT_DIMENSIONS);
  private _registrationPoint = vec3(0.5, 0.5, 0.5);
  private _velocity = vec3();
  private _angularVelocity = vec3();
  private _acceleration = vec3();
  private _gravity = vec3();
  private _density = ENTITY_ITEM_DEFAULT_DENSITY;
  private _volumeMultiplier = 1;
  private _damping = ENTITY_ITEM_DEFAULT_DAMPING;
  private _angularDamping = ENTITY_ITEM_DEFAULT_ANGULAR_DAMPING;
  private _restitution = ENTITY_ITEM_DEFAULT_RESTITUTION;
  private _friction = ENTITY_ITEM_DEFAULT_FRICTION;
  private _lifetime = ENTITY_ITEM_IMMORTAL_LIFETIME;
  private _collisionless = false;
  private _collisionMask = ENTITY_COLLISION_MASK_DEFAULT;
  private _dynamic = false;
  private _href = '';

  private readonly _simulationOwner = new SimulationOwner();
  private dirtyFlags = 0;

  // ── Cached bounds ─────────────────────────────────────
  private maxAACube: AACube = { corner: vec3(), scale: 0 };
  private minAACube: AACube = { corner: vec3(), scale: 0 };
  private cachedAABox: AABox = { corner: vec3(), dimensions: vec3() };
  private recalcMaxAACube = true;
  private recalcMinAACube = true;
  private recalcAABox = true;
  private queryAACube: AACube | null = null;

  // ── Back-references held by others ────────────────────
  private simulated = false;
  private indexed = false;
  private waitingActionData: Uint8Array | null = null;

  private readonly ledger: ActionLedger;

  constructor(readonly env: EntityEnvironment, options: EntityItemOptions) {
    this.id = options.id;
    this.type = options.type ?? EntityTypes.Unknown;
    const now = env.now();
    this.lastSimulated = now;
    this.lastUpdated = now;
    this.ledger = new ActionLedger({
      ownerId: options.id,
      env,
      factory: options.actionFactory ?? null,
      markDirty: (flags) => {
        this.dirtyFlags |= flags;
      },
    });
  }

  // ── Accessors ─────────────────────────────────────────

  get position(): Vec3 { return vec3Clone(this._position); }
  get rotation(): Quat { return quatClone(this._rotation); }
  get dimensions(): Vec3 { return vec3Clone(this._dimensions); }
  get registrationPoint(): Vec3 { return vec3Clone(this._registrationPoint); }
  get velocity(): Vec3 { return vec3Clone(this._velocity); }
  get angularVelocity(): Vec3 { return vec3Clone(this._angularVelocity); }
  get acceleration(): Vec3 { return vec3Clone(this._acceleration); }
  get gravity(): Vec3 { return vec3Clone(this._gravity); }
  get density(): number { return this._density; }
  get damping(): number { return this._damping; }
  get angularDamping(): number { return this._angularDamping; }
  get restitution(): number { return this._restitution; }
  get friction(): number { return this._friction; }
  get lifetime(): number { return this._lifetime; }
  get collisionless(): boolean { return this._collisionless; }
  get collisionMask(): number { return this._collisionMask; }
  get dynamic(): boolean { return this._dynamic; }
  get href(): string { return this._href; }
  get simulationOwner(): SimulationOwnerData { return this._simulationOwner.toData(); }

  /** Snapshot of every replicated property */
  getProperties(): EntityPropertyValues {
    return {
      simulationOwner: this._simulationOwner.toData(),
      position: this.position,
      rotation: this.rotation,
      velocity: this.velocity,
      angularVelocity: this.angularVelocity,
      acceleration: this.acceleration,
      dimensions: this.dimensions,
      density: this._density,
      gravity: this.gravity,
      damping: this._damping,
      restitution: this._restitution,
      friction: this._friction,
      lifetime: this._lifetime,
      script: this.script,
      scriptTimestamp: this.scriptTimestamp,
      registrationPoint: this.registrationPoint,
      angularDamping: this._angularDamping,
      visible: this.visible,
      collisionless: this._collisionless,
      collisionMask: this._collisionMask,
      dynamic: this._dynamic,
      locked: this.locked,
      userData: this.userData,
      marketplaceId: this.marketplaceId,
      name: this.name,
      collisionSoundUrl: this.collisionSoundUrl,
      href: this._href,
      description: this.description,
      actionData: this.getActionData(),
      parentId: this.parentId,
      parentJointIndex: this.parentJointIndex,
      queryAACube: this.getQueryAACube(),
    };
  }

  /**
   * Local edit. Returns true when any property was supplied; the edit clock
   * then moves to now, and a transform or velocity change restarts
   * extrapolation from now.
   */
  setProperties(edit: EntityEdit, simulation: ActionSimulation | null = null): boolean {
    let somethingChanged = false;
    const moved = this.collectRaisedFlags(DIRTY_TRANSFORM | DIRTY_VELOCITIES, () => {
      for (const entry of ENTITY_PROPERTIES) {
        if (entry.apply(this, edit, simulation)) somethingChanged = true;
      }
    });

    const now = this.env.now();
    if (edit.created !== undefined && edit.created !== UNKNOWN_CREATED_TIME) {
      this.updateCreated(Math.min(edit.created, now));
      somethingChanged = true;
    }

    if (somethingChanged) {
      this.setLastEdited(now);
      if (moved) this.lastSimulated = now;
    }
    return somethingChanged;
  }

  setLastEdited(time: number) {
    this.lastEdited = time;
    this.lastUpdated = time;
  }

  /** Stamps a freshly created entity. */
  recordCreationTime() {
    const now = this.env.now();
    if (this.created === UNKNOWN_CREATED_TIME) this.created = now;
    this.lastEdited = this.created;
    this.lastUpdated = now;
    this.lastSimulated = now;
  }

  // ── Dirty flags ───────────────────────────────────────

  getDirtyFlags(): number {
    return this.dirtyFlags;
  }

  clearDirtyFlags(mask = DIRTY_ALL) {
    this.dirtyFlags &= ~mask;
  }

  /**
   * Runs `fn` and returns the bits of `mask` it raised, including bits that
   * were already set beforehand. Flags pending for the simulation are kept.
   */
  collectRaisedFlags(mask: number, fn: () => void): number {
    const pending = this.dirtyFlags;
    this.dirtyFlags &= ~mask;
    try {
      fn();
      return this.dirtyFlags & mask;
    } finally {
      this.dirtyFlags |= pending;
    }
  }

  // ── Transform ─────────────────────────────────────────

  setPosition(value: Vec3) {
    if (vec3Equals(this._position, value)) return;
    this._position = vec3Clone(value);
    this.requiresRecalcBoxes();
  }

  updatePosition(value: Vec3) {
    if (this.shouldSuppressLocationEdits()) return;
    if (vec3Equals(this._position, value)) return;
    this.setPosition(value);
    this.dirtyFlags |= DIRTY_POSITION;
  }

  setRotation(value: Quat) {
    if (quatEquals(this._rotation, value)) return;
    this._rotation = quatClone(value);
    this.requiresRecalcBoxes();
  }

  updateRotation(value: Quat) {
    if (this.shouldSuppressLocationEdits()) return;
    if (quatEquals(this._rotation, value)) return;
    this.setRotation(value);
    this.dirtyFlags |= DIRTY_ROTATION;
  }

  /** Ignores values with a non-positive component. Returns whether it took. */
  setDimensions(value: Vec3): boolean {
    if (value.x <= 0 || value.y <= 0 || value.z <= 0) return false;
    this._dimensions = vec3Clone(value);
    this.requiresRecalcBoxes();
    return true;
  }

  updateDimensions(value: Vec3) {
    if (vec3Equals(this._dimensions, value)) return;
    if (this.setDimensions(value)) this.dirtyFlags |= DIRTY_SHAPE | DIRTY_MASS;
  }

  setRegistrationPoint(value: Vec3) {
    this._registrationPoint = vec3(clamp(value.x, 0, 1), clamp(value.y, 0, 1), clamp(value.z, 0, 1));
    this.requiresRecalcBoxes();
  }

  // ── Motion ────────────────────────────────────────────

  setVelocity(value: Vec3) {
    this._velocity = vec3Clone(value);
  }

  updateVelocity(value: Vec3) {
    if (this.shouldSuppressLocationEdits()) return;
    if (vec3Equals(this._velocity, value)) return;
    this._velocity = vec3Length(value) < MIN_LINEAR_SPEED ? vec3() : vec3Clone(value);
    this.dirtyFlags |= DIRTY_LINEAR_VELOCITY;
  }

  setAngularVelocity(value: Vec3) {
    this._angularVelocity = vec3Clone(value);
  }

  updateAngularVelocity(value: Vec3) {
    if (this.shouldSuppressLocationEdits()) return;
    if (vec3Equals(this._angularVelocity, value)) return;
    this._angularVelocity = vec3Length(value) < MIN_ANGULAR_SPEED ? vec3() : vec3Clone(value);
    this.dirtyFlags |= DIRTY_ANGULAR_VELOCITY;
  }

  setAcceleration(value: Vec3) {
    this._acceleration = vec3Clone(value);
  }

  updateGravity(value: Vec3) {
    if (vec3Equals(this._gravity, value)) return;
    this._gravity = vec3Clone(value);
    this.dirtyFlags |= DIRTY_LINEAR_VELOCITY;
  }

  updateDamping(value: number) {
    const clamped = clamp(value, 0, 1);
    if (this._damping === clamped) return;
    this._damping = clamped;
    this.dirtyFlags |= DIRTY_MATERIAL;
  }

  updateAngularDamping(value: number) {
    const clamped = clamp(value, 0, 1);
    if (this._angularDamping === clamped) return;
    this._angularDamping = clamped;
    this.dirtyFlags |= DIRTY_MATERIAL;
  }

  isMoving(): boolean {
    return !vec3IsZero(this._velocity) || !vec3IsZero(this._angularVelocity);
  }

  // ── Material / mass ───────────────────────────────────

  setRestitution(value: number) {
    this._restitution = clamp(value, ENTITY_ITEM_MIN_RESTITUTION, ENTITY_ITEM_MAX_RESTITUTION);
  }

  updateRestitution(value: number) {
    const clamped = clamp(value, ENTITY_ITEM_MIN_RESTITUTION, ENTITY_ITEM_MAX_RESTITUTION);
    if (this._restitution === clamped) return;
    this._restitution = clamped;
    this.dirtyFlags |= DIRTY_MATERIAL;
  }

  setFriction(value: number) {
    this._friction = clamp(value, ENTITY_ITEM_MIN_FRICTION, ENTITY_ITEM_MAX_FRICTION);
  }

  updateFriction(value: number) {
    const clamped = clamp(value, ENTITY_ITEM_MIN_FRICTION, ENTITY_ITEM_MAX_FRICTION);
    if (this._friction === clamped) return;
    this._friction = clamped;
    this.dirtyFlags |= DIRTY_MATERIAL;
  }

  setDensity(value: number) {
    this._density = clamp(value, ENTITY_ITEM_MIN_DENSITY, ENTITY_ITEM_MAX_DENSITY);
  }

  updateDensity(value: number) {
    const clamped = clamp(value, ENTITY_ITEM_MIN_DENSITY, ENTITY_ITEM_MAX_DENSITY);
    if (this._density === clamped) return;
    this._density = clamped;
    this.dirtyFlags |= DIRTY_MASS;
  }

  private volume(): number {
    const d = this._dimensions;
    return this._volumeMultiplier * d.x * d.y * d.z;
  }

  computeMass(): number {
    return this._density * this.volume();
  }

  /**
   * Mass is stored as density at the current volume, so the density range
   * may refuse part of the requested mass.
   */
  private densityForMass(mass: number): number {
    const volume = this.volume();
    return clamp(mass / Math.max(volume, MIN_VOLUME), ENTITY_ITEM_MIN_DENSITY, ENTITY_ITEM_MAX_DENSITY);
  }

  setMass(mass: number) {
    this._density = this.densityForMass(mass);
  }

  updateMass(mass: number) {
    const density = this.densityForMass(mass);
    if (this._density === density) return;
    this._density = density;
    this.dirtyFlags |= DIRTY_MASS;
  }

  // ── Collision ─────────────────────────────────────────

  updateCollisionless(value: boolean) {
    if (this._collisionless === value) return;
    this._collisionless = value;
    this.dirtyFlags |= DIRTY_COLLISION_GROUP;
  }

  updateCollisionMask(value: number) {
    const masked = value & ENTITY_COLLISION_MASK_DEFAULT;
    if (this._collisionMask === masked) return;
    this._collisionMask = masked;
    this.dirtyFlags |= DIRTY_COLLISION_GROUP;
  }

  updateDynamic(value: boolean) {
    if (this._dynamic === value) return;
    this._dynamic = value;
    this.dirtyFlags |= DIRTY_MOTION_TYPE;
  }

  // ── Lifetime ──────────────────────────────────────────

  updateLifetime(value: number) {
    if (this._lifetime === value) return;
    this._lifetime = value;
    this.dirtyFlags |= DIRTY_LIFETIME;
  }

  updateCreated(value: number) {
    if (this.created === value) return;
    this.created = value;
    this.dirtyFlags |= DIRTY_LIFETIME;
  }

  /** Seconds since creation */
  getAge(now = this.env.now()): number {
    return (now - this.created) / USECS_PER_SECOND;
  }

  isMortal(): boolean {
    return this._lifetime !== ENTITY_ITEM_IMMORTAL_LIFETIME;
  }

  lifetimeHasExpired(now = this.env.now()): boolean {
    return this.isMortal() && this.getAge(now) > this._lifetime;
  }

  getExpiry(): number {
    return this.created + Math.floor(this._lifetime * USECS_PER_SECOND);
  }

  // ── Misc ──────────────────────────────────────────────

  /** Only absolute URLs are kept; an empty string clears. */
  setHref(value: string) {
    if (value !== '' && !ABSOLUTE_URL.test(value)) return;
    this._href = value;
  }

  // ── Simulation ownership ──────────────────────────────

  setSimulationOwner(owner: SimulationOwnerData) {
    this._simulationOwner.set(owner);
  }

  updateSimulationOwner(owner: SimulationOwnerData) {
    if (!this._simulationOwner.equals(owner)) {
      this.env.logger.debug('Simulation ownership changed', {
        entity: this.id,
        owner: `${owner.id}:${owner.priority & 0xFF}`,
      });
    }
    if (this._simulationOwner.set(owner)) {
      this.dirtyFlags |= DIRTY_SIMULATOR_ID;
    }
  }

  clearSimulationOwnership() {
    this._simulationOwner.clear();
  }

  /** This peer holds valid ownership */
  weOwnSimulation(): boolean {
    return this._simulationOwner.matchesValidId(this.env.sessionId);
  }

  /**
   * Physics group and effective mask. Someone else's simulation sees the
   * avatars from the other side, so a mask that treats them differently is
   * mirrored while another peer owns the entity.
   */
  computeCollisionGroupAndFinalMask(): CollisionGroupAndMask {
    if (this._collisionless) {
      return { group: COLLISION_GROUP_COLLISIONLESS, mask: 0 };
    }
    let group = COLLISION_GROUP_STATIC;
    if (this._dynamic) group = COLLISION_GROUP_DYNAMIC;
    else if (this.isMoving() || this.hasActions()) group = COLLISION_GROUP_KINEMATIC;

    let userMask = this._collisionMask;
    const hitsMine = (userMask & COLLISION_GROUP_MY_AVATAR) !== 0;
    const hitsOthers = (userMask & COLLISION_GROUP_OTHER_AVATAR) !== 0;
    if (hitsMine !== hitsOthers) {
      const owner = this._simulationOwner.id;
      if (owner !== NULL_ID && owner !== this.env.sessionId) {
        userMask ^= COLLISION_MASK_AVATARS;
      }
    }
    return { group, mask: defaultCollisionMask(group) & userMask };
  }

  /** Motion-only snapshot */
  getTerseUpdateProperties(): EntityPropertyDelta {
    return {
      position: this.position,
      rotation: this.rotation,
      velocity: this.velocity,
      angularVelocity: this.angularVelocity,
      acceleration: this.acceleration,
    };
  }

  // ── Frames ────────────────────────────────────────────
  // Entity space is the unit box centred on the origin, so the registration
  // point sits at `registrationPoint - 0.5`.

  entityToWorld(point: Vec3): Vec3 {
    const local = vec3Add(point, vec3Sub(vec3(0.5, 0.5, 0.5), this._registrationPoint));
    return vec3Add(this._position, quatRotateVec3(this._rotation, vec3Mul(local, this._dimensions)));
  }

  worldToEntity(point: Vec3): Vec3 {
    const scaled = quatRotateVec3(quatConjugate(this._rotation), vec3Sub(point, this._position));
    return vec3Sub(vec3Div(scaled, this._dimensions), vec3Sub(vec3(0.5, 0.5, 0.5), this._registrationPoint));
  }

  /** World transform of the unit shape, centred on the entity's middle */
  getTransformToCenter(): Transform {
    return {
      translation: this.entityToWorld(vec3()),
      rotation: quatClone(this._rotation),
      scale: vec3Clone(this._dimensions),
    };
  }

  /** Point test against the entity's shape: spheres by radius, everything else as a box */
  contains(point: Vec3): boolean {
    const local = this.worldToEntity(point);
    if (this.type === EntityTypes.Sphere) return vec3Length(local) <= 0.5;
    return Math.abs(local.x) <= 0.5 && Math.abs(local.y) <= 0.5 && Math.abs(local.z) <= 0.5;
  }

  // ── Bounding volumes ──────────────────────────────────

  private requiresRecalcBoxes() {
    this.recalcMaxAACube = true;
    this.recalcMinAACube = true;
    this.recalcAABox = true;
  }

  private registrationExtents(): { min: Vec3; max: Vec3 } {
    const min = vec3Sub(vec3(), vec3Mul(this._dimensions, this._registrationPoint));
    const max = vec3Mul(this._dimensions, vec3Sub(vec3(1, 1, 1), this._registrationPoint));
    return { min, max };
  }

  /** Cube holding the entity at any rotation about its registration point */
  getMaximumAACube(): AACube {
    if (this.recalcMaxAACube) {
      const nearSide = vec3Mul(this._dimensions, this._registrationPoint);
      const farSide = vec3Mul(this._dimensions, vec3Sub(vec3(1, 1, 1), this._registrationPoint));
      const radius = vec3Length(vec3Max(nearSide, farSide));
      this.maxAACube = { corner: vec3Sub(this._position, vec3(radius, radius, radius)), scale: radius * 2 };
      this.recalcMaxAACube = false;
    }
    return { corner: vec3Clone(this.maxAACube.corner), scale: this.maxAACube.scale };
  }

  /** Smallest cube around the rotated box */
  getMinimumAACube(): AACube {
    if (this.recalcMinAACube) {
      const box = this.getAABox();
      const longest = Math.max(box.dimensions.x, box.dimensions.y, box.dimensions.z);
      const half = longest / 2;
      const center = vec3Add(box.corner, vec3(box.dimensions.x / 2, box.dimensions.y / 2, box.dimensions.z / 2));
      this.minAACube = { corner: vec3Sub(center, vec3(half, half, half)), scale: longest };
      this.recalcMinAACube = false;
    }
    return { corner: vec3Clone(this.minAACube.corner), scale: this.minAACube.scale };
  }

  getAABox(): AABox {
    if (this.recalcAABox) {
      const { min, max } = this.registrationExtents();
      this.cachedAABox = rotatedExtents(min, max, this._rotation, this._position);
      this.recalcAABox = false;
    }
    return { corner: vec3Clone(this.cachedAABox.corner), dimensions: vec3Clone(this.cachedAABox.dimensions) };
  }

  /** Query cube as last set or received; the current maximum cube until then */
  getQueryAACube(): AACube {
    if (!this.queryAACube) return this.getMaximumAACube();
    return { corner: vec3Clone(this.queryAACube.corner), scale: this.queryAACube.scale };
  }

  setQueryAACube(cube: AACube) {
    this.queryAACube = { corner: vec3Clone(cube.corner), scale: cube.scale };
  }

  updateQueryAACube() {
    this.queryAACube = this.getMaximumAACube();
  }

  // ── Kinematics ────────────────────────────────────────

  /** Per-frame extrapolation up to `now` */
  simulate(now: number) {
    if (this.lastSimulated === 0) this.lastSimulated = now;
    this.simulateKinematicMotion((now - this.lastSimulated) / USECS_PER_SECOND);
    this.lastSimulated = now;
  }

  /**
   * Advances transform by `timeElapsed` seconds. Entities driven by actions
   * are left alone. With `setFlags` off no motion-type change is reported.
   */
  simulateKinematicMotion(timeElapsed: number, setFlags = true) {
    if (this.hasActions()) return;

    const result = integrate({
      position: this._position,
      rotation: this._rotation,
      velocity: this._velocity,
      angularVelocity: this._angularVelocity,
      acceleration: this._acceleration,
      damping: this._damping,
      angularDamping: this._angularDamping,
    }, timeElapsed, setFlags);

    this.setRotation(result.rotation);
    this.setPosition(result.position);
    this._velocity = result.velocity;
    this._angularVelocity = result.angularVelocity;
    if (result.motionTypeChanged) this.dirtyFlags |= DIRTY_MOTION_TYPE;
  }

  // ── Actions ───────────────────────────────────────────

  addAction(simulation: ActionSimulation, action: EntityAction): boolean {
    const added = this.ledger.add(simulation, action);
    this.updateQueryAACube();
    return added;
  }

  updateAction(simulation: ActionSimulation, id: EntityId, args: ActionArguments): boolean {
    return this.ledger.update(simulation, id, args);
  }

  removeAction(simulation: ActionSimulation, id: EntityId): boolean {
    return this.ledger.remove(simulation, id);
  }

  clearActions(simulation: ActionSimulation) {
    this.ledger.clear(simulation);
  }

  /**
   * Received action data. Without a simulation to place actions in, the data
   * waits until the entity joins one.
   */
  setActionData(simulation: ActionSimulation | null, data: Uint8Array) {
    if (!simulation) {
      this.waitingActionData = data.slice();
      return;
    }
    this.waitingActionData = null;
    this.ledger.setActionData(simulation, data);
  }

  getActionData(): Uint8Array {
    return this.waitingActionData ? this.waitingActionData.slice() : this.ledger.getActionData();
  }

  getActionArguments(id: EntityId): ActionArguments | null {
    return this.ledger.getArguments(id);
  }

  getActionsOfType(type: number): EntityAction[] {
    return this.ledger.getActionsOfType(type);
  }

  hasActions(): boolean {
    return this.ledger.hasActions();
  }

  actionIds(): EntityId[] {
    return this.ledger.ids();
  }

  shouldSuppressLocationEdits(): boolean {
    return this.ledger.shouldSuppressLocationEdits();
  }

  isActionTombstoned(id: EntityId): boolean {
    return this.ledger.isTombstoned(id);
  }

  get actionDataNeedsTransmit(): boolean {
    return this.ledger.needsTransmit;
  }

  set actionDataNeedsTransmit(value: boolean) {
    this.ledger.needsTransmit = value;
  }

  // ── Lifecycle ─────────────────────────────────────────

  get isSimulated(): boolean {
    return this.simulated;
  }

  get isIndexed(): boolean {
    return this.indexed;
  }

  /** Called by the simulation that takes (or gives up) the entity */
  markSimulated(simulation: ActionSimulation | null) {
    this.simulated = simulation !== null;
    if (simulation && this.waitingActionData) {
      const data = this.waitingActionData;
      this.waitingActionData = null;
      this.ledger.setActionData(simulation, data);
    }
  }

  /** Called by the spatial index when it stores (or drops) the entity */
  markIndexed(indexed: boolean) {
    this.indexed = indexed;
  }

  /**
   * Detaches every action from `simulation`. The simulation and the spatial
   * index must have released the entity first.
   */
  destroy(simulation: ActionSimulation | null) {
    if (this.simulated) throw new Error(`Entity ${this.id} destroyed while still in a simulation`);
    if (this.indexed) throw new Error(`Entity ${this.id} destroyed while still in the spatial index`);
    if (simulation) this.ledger.clear(simulation);
  }

  toString(): string {
    return this.name ? `${this.name} (${this.id})` : this.id;
  }
}
