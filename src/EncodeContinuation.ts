import type { PropertyFlags } from './PropertyFlags.js';
import type { EntityId } from './types.js';

/** Properties still owed to a receiver, per entity, across packets. */
export interface EncodeContinuation {
  /** Pending set for `id`, or `requested` when nothing is pending */
  pendingFor(id: EntityId, requested: PropertyFlags): PropertyFlags;
  store(id: EntityId, didntFit: PropertyFlags): void;
  complete(id: EntityId): void;
  has(id: EntityId): boolean;
  readonly size: number;
  pendingIds(): EntityId[];
  clear(): void;
}

export function createEncodeContinuation(): EncodeContinuation {
  const pending = new Map<EntityId, PropertyFlags>();

  return {
    pendingFor(id, requested) {
      const left = pending.get(id);
      return left ? left.clone() : requested.clone();
    },

    store(id, didntFit) {
      if (didntFit.isEmpty()) pending.delete(id);
      else pending.set(id, didntFit.clone());
    },

    complete(id) {
      pending.delete(id);
    },

    has(id) {
      return pending.has(id);
    },

    get size() {
      return pending.size;
    },

    pendingIds() {
      return [...pending.keys()];
    },

    clear() {
      pending.clear();
    },
  };
}
