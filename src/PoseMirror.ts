import { component, createEntityManager } from 'archetype-ecs';
import type { EntityId as EcsEntityId, EntityManager } from 'archetype-ecs';
import type { Quat, Vec3 } from './math.js';
import { ReadWriteLock } from './ReadWriteLock.js';
import type { EntityId } from './types.js';

// ── Component ───────────────────────────────────────────

export const Pose = component('Pose', 'f64', ['px', 'py', 'pz', 'rx', 'ry', 'rz', 'rw']);

export interface PoseSample {
  position: Vec3;
  rotation: Quat;
}

// ── Mirror ──────────────────────────────────────────────

/**
 * Externally visible copy of entity poses, kept in an archetype-ecs world
 * so render/physics-side systems can query it without touching EntityItem.
 * Publishing takes the exclusive section; reads take the shared one.
 */
export interface PoseMirror {
  readonly em: EntityManager;
  readonly size: number;
  publish(id: EntityId, position: Vec3, rotation: Quat): void;
  read(id: EntityId): PoseSample | undefined;
  remove(id: EntityId): boolean;
  ids(): EntityId[];
  clear(): void;
}

function num(v: unknown): number {
  return typeof v === 'number' ? v : 0;
}

export function createPoseMirror(em: EntityManager = createEntityManager()): PoseMirror {
  const lock = new ReadWriteLock('pose mirror');
  const rows = new Map<EntityId, EcsEntityId>();

  function write(eid: EcsEntityId, p: Vec3, r: Quat) {
    em.set(eid, Pose.px, p.x);
    em.set(eid, Pose.py, p.y);
    em.set(eid, Pose.pz, p.z);
    em.set(eid, Pose.rx, r.x);
    em.set(eid, Pose.ry, r.y);
    em.set(eid, Pose.rz, r.z);
    em.set(eid, Pose.rw, r.w);
  }

  return {
    em,

    get size() {
      return rows.size;
    },

    publish(id, position, rotation) {
      lock.withWriteLock(() => {
        const eid = rows.get(id);
        if (eid === undefined) {
          rows.set(id, em.createEntityWith(Pose, {
            px: position.x, py: position.y, pz: position.z,
            rx: rotation.x, ry: rotation.y, rz: rotation.z, rw: rotation.w,
          }));
          return;
        }
        write(eid, position, rotation);
      });
    },

    read(id) {
      return lock.withReadLock(() => {
        const eid = rows.get(id);
        if (eid === undefined) return undefined;
        return {
          position: { x: num(em.get(eid, Pose.px)), y: num(em.get(eid, Pose.py)), z: num(em.get(eid, Pose.pz)) },
          rotation: {
            x: num(em.get(eid, Pose.rx)),
            y: num(em.get(eid, Pose.ry)),
            z: num(em.get(eid, Pose.rz)),
            w: num(em.get(eid, Pose.rw)),
          },
        };
      });
    },

    remove(id) {
      return lock.withWriteLock(() => {
        const eid = rows.get(id);
        if (eid === undefined) return false;
        em.destroyEntity(eid);
        rows.delete(id);
        return true;
      });
    },

    ids() {
      return lock.withReadLock(() => [...rows.keys()]);
    },

    clear() {
      lock.withWriteLock(() => {
        for (const eid of rows.values()) em.destroyEntity(eid);
        rows.clear();
      });
    },
  };
}
