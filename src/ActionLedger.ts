import { DecodeError } from './errors.js';
import type { ActionArguments, ActionFactory, ActionSimulation, EntityAction } from './EntityAction.js';
import { readActionHeader } from './EntityAction.js';
import { ProtocolDecoder, ProtocolEncoder } from './Protocol.js';
import { ReadWriteLock } from './ReadWriteLock.js';
import type { EntityEnvironment, EntityId } from './types.js';
import { DIRTY_PHYSICS_ACTIVATION } from './types.js';

// ── Cache format ────────────────────────────────────────
// count (count coded), then per action: length (count coded) + blob

export type SerializeResult =
  | { success: true; data: Uint8Array }
  | { success: false; size: number };

/** Serialized ledger, or failure when the result would reach `maxSize` bytes. */
export function serializeActions(actions: Iterable<EntityAction>, maxSize: number): SerializeResult {
  const encoder = new ProtocolEncoder();
  const blobs: Uint8Array[] = [];
  for (const action of actions) blobs.push(action.serialize());
  if (blobs.length === 0) return { success: true, data: new Uint8Array(0) };

  encoder.writeVarint(blobs.length);
  for (const blob of blobs) {
    encoder.writeVarint(blob.byteLength);
    encoder.writeRaw(blob);
  }
  if (encoder.length >= maxSize) return { success: false, size: encoder.length };
  return { success: true, data: encoder.finishBytes() };
}

export function parseActionData(data: Uint8Array): Uint8Array[] {
  if (data.byteLength === 0) return [];
  const decoder = new ProtocolDecoder(data);
  const count = decoder.readVarint();
  const blobs: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    const length = decoder.readVarint();
    if (length > decoder.remaining) {
      throw new DecodeError(`Action blob ${i} claims ${length} bytes, ${decoder.remaining} left`, decoder.position);
    }
    blobs.push(data.slice(decoder.position, decoder.position + length));
    decoder.reset(data, decoder.position + length);
  }
  return blobs;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// ── Ledger ──────────────────────────────────────────────

export interface ActionLedgerOptions {
  ownerId: EntityId;
  env: EntityEnvironment;
  factory: ActionFactory | null;
  /** Raises simulation dirty flags on the owning entity */
  markDirty(flags: number): void;
}

/**
 * Ordered id → action map of one entity plus its serialized cache.
 * Mutations run in the exclusive section and always name the simulation
 * the action lives in.
 */
export class ActionLedger {
  private readonly actions = new Map<EntityId, EntityAction>();
  private readonly previouslyDeleted = new Map<EntityId, number>();
  private actionsToRemove = new Set<EntityId>();
  private cache: Uint8Array = new Uint8Array(0);
  private dataDirty = false;
  private readonly lock: ReadWriteLock;
  private readonly ownerId: EntityId;
  private readonly env: EntityEnvironment;
  private readonly factory: ActionFactory | null;
  private readonly markDirty: (flags: number) => void;

  /** Cache changed locally and has not been sent yet */
  needsTransmit = false;

  constructor(options: ActionLedgerOptions) {
    this.ownerId = options.ownerId;
    this.env = options.env;
    this.factory = options.factory;
    this.markDirty = options.markDirty;
    this.lock = new ReadWriteLock(`actions ${options.ownerId}`);
  }

  // ── Mutations ───────────────────────────────────────

  add(simulation: ActionSimulation, action: EntityAction): boolean {
    if (action.ownerEntityId !== null && action.ownerEntityId !== this.ownerId) {
      throw new Error(`Action ${action.id} belongs to entity ${action.ownerEntityId}, not ${this.ownerId}`);
    }
    const existing = this.lock.withReadLock(() => this.actions.get(action.id));
    if (existing && existing !== action) {
      throw new Error(`Entity ${this.ownerId} already has a different action with id ${action.id}`);
    }

    return this.lock.withWriteLock(() => {
      this.checkWaitingToRemove(simulation);
      action.ownerEntityId = this.ownerId;
      const added = this.addInternal(simulation, action);
      if (added) {
        action.locallyAddedButNotYetReceived = true;
        this.dataDirty = true;
      } else {
        this.removeInternal(simulation, action.id);
      }
      return added;
    });
  }

  update(simulation: ActionSimulation, id: EntityId, args: ActionArguments): boolean {
    return this.lock.withWriteLock(() => {
      this.checkWaitingToRemove(simulation);
      const action = this.actions.get(id);
      if (!action) return false;
      if (!action.updateArguments(args)) {
        this.env.logger.debug('Action rejected argument update', { entity: this.ownerId, action: id });
        return false;
      }
      const committed = this.commitCache();
      this.markDirty(DIRTY_PHYSICS_ACTIVATION);
      return committed;
    });
  }

  remove(simulation: ActionSimulation, id: EntityId): boolean {
    return this.lock.withWriteLock(() => {
      this.checkWaitingToRemove(simulation);
      return this.removeInternal(simulation, id);
    });
  }

  clear(simulation: ActionSimulation) {
    this.lock.withWriteLock(() => {
      for (const action of this.actions.values()) {
        action.ownerEntityId = null;
        simulation.removeAction(action);
      }
      this.actions.clear();
      this.actionsToRemove.clear();
      this.cache = new Uint8Array(0);
      this.markDirty(DIRTY_PHYSICS_ACTIVATION);
    });
  }

  /** Resynchronizes the ledger against a received cache. */
  setActionData(simulation: ActionSimulation, data: Uint8Array) {
    this.lock.withWriteLock(() => {
      if (!sameBytes(this.cache, data)) this.deserializeInternal(simulation, data);
      this.checkWaitingToRemove(simulation);
    });
  }

  // ── Queries ─────────────────────────────────────────

  /** Serialized cache, reserialized first if a deserialize left it stale. */
  getActionData(): Uint8Array {
    if (this.dataDirty) {
      this.lock.withWriteLock(() => {
        const result = serializeActions(this.actions.values(), this.env.maxActionsDataSize);
        if (result.success) this.cache = result.data;
        this.dataDirty = false;
      });
    }
    return this.lock.withReadLock(() => this.cache.slice());
  }

  getArguments(id: EntityId): ActionArguments | null {
    return this.lock.withReadLock(() => {
      const action = this.actions.get(id);
      if (!action) return null;
      return { ...action.getArguments(), type: action.type };
    });
  }

  getActionsOfType(type: number): EntityAction[] {
    return this.lock.withReadLock(() => [...this.actions.values()].filter((a) => a.type === type));
  }

  getAction(id: EntityId): EntityAction | undefined {
    return this.lock.withReadLock(() => this.actions.get(id));
  }

  hasActions(): boolean {
    return this.lock.withReadLock(() => this.actions.size > 0);
  }

  get size(): number {
    return this.lock.withReadLock(() => this.actions.size);
  }

  ids(): EntityId[] {
    return this.lock.withReadLock(() => [...this.actions.keys()]);
  }

  shouldSuppressLocationEdits(): boolean {
    return this.lock.withReadLock(() => {
      for (const action of this.actions.values()) {
        if (action.shouldSuppressLocationEdits()) return true;
      }
      return false;
    });
  }

  isTombstoned(id: EntityId): boolean {
    return this.lock.withReadLock(() => this.previouslyDeleted.has(id));
  }

  // ── Internals (exclusive section held) ──────────────

  private addInternal(simulation: ActionSimulation, action: EntityAction): boolean {
    this.actions.set(action.id, action);
    simulation.addAction(action);
    if (!this.commitCache()) return false;
    this.markDirty(DIRTY_PHYSICS_ACTIVATION);
    return true;
  }

  private removeInternal(simulation: ActionSimulation | null, id: EntityId): boolean {
    this.previouslyDeleted.set(id, this.env.now());
    const action = this.actions.get(id);
    if (!action) return false;

    action.ownerEntityId = null;
    action.locallyAddedButNotYetReceived = false;
    this.actions.delete(id);
    if (simulation) simulation.removeAction(action);
    const committed = this.commitCache();
    this.markDirty(DIRTY_PHYSICS_ACTIVATION);
    return committed;
  }

  private commitCache(): boolean {
    const result = serializeActions(this.actions.values(), this.env.maxActionsDataSize);
    if (!result.success) {
      this.env.logger.warn('Action data too large, not committed', {
        entity: this.ownerId,
        size: result.size,
        max: this.env.maxActionsDataSize,
      });
      return false;
    }
    this.cache = result.data;
    this.needsTransmit = true;
    return true;
  }

  private checkWaitingToRemove(simulation: ActionSimulation) {
    const ids = this.actionsToRemove;
    this.actionsToRemove = new Set();
    for (const id of ids) this.removeInternal(simulation, id);
  }

  /** The cache only takes `data` once it parses; malformed data leaves both cache and actions alone. */
  private deserializeInternal(simulation: ActionSimulation, data: Uint8Array) {
    const now = this.env.now();

    let blobs: Uint8Array[];
    try {
      blobs = parseActionData(data);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.env.logger.warn('Malformed action data ignored', { entity: this.ownerId, error: err.message });
      return;
    }
    this.cache = data.slice();

    const updated = new Set<EntityId>();
    for (const blob of blobs) {
      let id: EntityId;
      try {
        id = readActionHeader(new ProtocolDecoder(blob)).id;
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        this.env.logger.warn('Action blob without a readable header skipped', { entity: this.ownerId });
        continue;
      }

      if (this.previouslyDeleted.has(id)) continue;

      const existing = this.actions.get(id);
      if (existing) {
        try {
          existing.deserialize(blob);
        } catch (err) {
          if (!(err instanceof DecodeError)) throw err;
          this.env.logger.warn('Action update could not be decoded', { entity: this.ownerId, action: id, error: err.message });
        }
        existing.locallyAddedButNotYetReceived = false;
        updated.add(id);
        continue;
      }

      const action = this.factory ? this.factory.create(this.ownerId, blob) : null;
      if (action) {
        action.ownerEntityId = this.ownerId;
        this.actions.set(action.id, action);
        simulation.addAction(action);
        this.markDirty(DIRTY_PHYSICS_ACTIVATION);
        updated.add(action.id);
      } else {
        this.env.logger.debug('Action creation failed', { entity: this.ownerId, action: id });
        this.removeInternal(null, id);
      }
    }

    for (const [id, action] of this.actions) {
      if (!updated.has(id) && !action.locallyAddedButNotYetReceived) {
        this.actionsToRemove.add(id);
        this.previouslyDeleted.set(id, now);
      }
    }

    for (const [id, deletedAt] of this.previouslyDeleted) {
      if (now - deletedAt > this.env.rememberDeletedActionTime) this.previouslyDeleted.delete(id);
    }

    this.dataDirty = true;
  }
}
