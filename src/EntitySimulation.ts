import type { EntityAction } from './EntityAction.js';
import type { EntityItem } from './EntityItem.js';
import type { TreeSimulation } from './EntityTree.js';
import type { PoseMirror } from './PoseMirror.js';
import type { SimulationOwnerData } from './SimulationOwner.js';
import type { EntityEnvironment, EntityId } from './types.js';
import { DIRTY_ALL, DIRTY_SIMULATOR_ID, DIRTY_TRANSFORM } from './types.js';

export interface OwnershipChange {
  id: EntityId;
  owner: SimulationOwnerData;
  /** Whether this peer now simulates the entity */
  ours: boolean;
}

export interface StepResult {
  /** Entities advanced by kinematic motion */
  moved: EntityId[];
  /** Dirty flags polled (and cleared) this step, per entity */
  dirty: Map<EntityId, number>;
  ownershipChanges: OwnershipChange[];
}

export interface EntitySimulationOptions {
  poseMirror?: PoseMirror | null;
}

export interface EntitySimulation extends TreeSimulation {
  readonly size: number;
  readonly actionCount: number;
  has(id: EntityId): boolean;
  hasAction(id: EntityId): boolean;
  step(now: number): StepResult;
  /** Called for every ownership change found by step() */
  onOwnershipChange: ((change: OwnershipChange) => void) | null;
}

/**
 * Minimal simulation: owns the per-frame extrapolation of moving entities,
 * the set of live actions and the dirty-flag poll.
 */
export function createEntitySimulation(env: EntityEnvironment, options?: EntitySimulationOptions): EntitySimulation {
  const mirror = options?.poseMirror ?? null;
  const entities = new Map<EntityId, EntityItem>();
  const actions = new Map<EntityId, EntityAction>();

  function publish(entity: EntityItem) {
    mirror?.publish(entity.id, entity.position, entity.rotation);
  }

  const sim: EntitySimulation = {
    onOwnershipChange: null,

    get size() {
      return entities.size;
    },

    get actionCount() {
      return actions.size;
    },

    has(id) {
      return entities.has(id);
    },

    hasAction(id) {
      return actions.has(id);
    },

    addEntity(entity) {
      entities.set(entity.id, entity);
      entity.markSimulated(sim);
      publish(entity);
    },

    removeEntity(entity) {
      if (!entities.delete(entity.id)) return;
      entity.markSimulated(null);
      mirror?.remove(entity.id);
    },

    addAction(action) {
      actions.set(action.id, action);
    },

    removeAction(action) {
      if (actions.get(action.id) === action) actions.delete(action.id);
    },

    step(now) {
      const result: StepResult = { moved: [], dirty: new Map(), ownershipChanges: [] };

      for (const entity of entities.values()) {
        const moving = entity.isMoving();
        if (moving) {
          entity.simulate(now);
          result.moved.push(entity.id);
        } else {
          entity.lastSimulated = now;
        }

        const flags = entity.getDirtyFlags();
        if (moving || flags & DIRTY_TRANSFORM) publish(entity);
        if (flags === 0) continue;
        entity.clearDirtyFlags(DIRTY_ALL);
        result.dirty.set(entity.id, flags);

        if (flags & DIRTY_SIMULATOR_ID) {
          const change: OwnershipChange = {
            id: entity.id,
            owner: entity.simulationOwner,
            ours: entity.weOwnSimulation(),
          };
          result.ownershipChanges.push(change);
          env.logger.debug('Simulation owner changed', { entity: entity.id, ours: change.ours });
          sim.onOwnershipChange?.(change);
        }
      }

      return result;
    },
  };

  return sim;
}
