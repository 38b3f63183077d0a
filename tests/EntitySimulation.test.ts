import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ArgumentAction } from '../src/EntityAction.js';
import type { OwnershipChange } from '../src/EntitySimulation.js';
import { createEntitySimulation } from '../src/EntitySimulation.js';
import { createEntityTree } from '../src/EntityTree.js';
import { createEntityEnvironment } from '../src/Environment.js';
import { silentLogger } from '../src/Logger.js';
import { createPoseMirror } from '../src/PoseMirror.js';
import { DIRTY_LINEAR_VELOCITY, DIRTY_MATERIAL, DIRTY_SIMULATOR_ID, USECS_PER_SECOND } from '../src/types.js';

const SESSION = '5e5e5e5e-0000-4000-8000-00000000000e';
const T0 = 1_700_000_000 * USECS_PER_SECOND;
const IDENTITY = { x: 0, y: 0, z: 0, w: 1 };

function setup() {
  let clock = T0;
  const env = createEntityEnvironment({ sessionId: SESSION, now: () => clock, logger: silentLogger });
  const mirror = createPoseMirror();
  const simulation = createEntitySimulation(env, { poseMirror: mirror });
  const tree = createEntityTree(env, { simulation });
  return {
    tree,
    simulation,
    mirror,
    at(time: number) {
      clock = time;
    },
  };
}

// ── Pose mirror ─────────────────────────────────────────

describe('PoseMirror', () => {
  it('stores, overwrites and removes poses', () => {
    const mirror = createPoseMirror();
    mirror.publish('a', { x: 1, y: 2, z: 3 }, IDENTITY);
    mirror.publish('a', { x: 4, y: 5, z: 6 }, { x: 0, y: 1, z: 0, w: 0 });
    mirror.publish('b', { x: 0, y: 0, z: 0 }, IDENTITY);

    assert.equal(mirror.size, 2);
    assert.deepEqual(mirror.read('a'), { position: { x: 4, y: 5, z: 6 }, rotation: { x: 0, y: 1, z: 0, w: 0 } });
    assert.equal(mirror.remove('a'), true);
    assert.equal(mirror.remove('a'), false);
    assert.equal(mirror.read('a'), undefined);
    assert.deepEqual(mirror.ids(), ['b']);
  });

  it('clear empties the mirror', () => {
    const mirror = createPoseMirror();
    mirror.publish('a', { x: 1, y: 1, z: 1 }, IDENTITY);
    mirror.clear();
    assert.equal(mirror.size, 0);
    assert.equal(mirror.read('a'), undefined);
  });
});

// ── Simulation ──────────────────────────────────────────

describe('EntitySimulation', () => {
  it('joins and leaves with the tree', () => {
    const t = setup();
    const entity = t.tree.addEntity({ properties: { position: { x: 1, y: 2, z: 3 } } });
    assert.equal(t.simulation.has(entity.id), true);
    assert.equal(entity.isSimulated, true);

    t.tree.deleteEntity(entity.id);
    assert.equal(t.simulation.size, 0);
    assert.equal(entity.isSimulated, false);
    assert.equal(t.mirror.read(entity.id), undefined);
  });

  it('advances moving entities and mirrors their pose', () => {
    const t = setup();
    const entity = t.tree.addEntity({ properties: { velocity: { x: 2, y: 0, z: 0 }, damping: 0 } });
    const still = t.tree.addEntity({ properties: { name: 'still' } });

    t.at(T0 + USECS_PER_SECOND / 2);
    const result = t.simulation.step(T0 + USECS_PER_SECOND / 2);

    assert.deepEqual(result.moved, [entity.id]);
    assert.deepEqual(entity.position, { x: 1, y: 0, z: 0 });
    assert.deepEqual(t.mirror.read(entity.id), { position: { x: 1, y: 0, z: 0 }, rotation: IDENTITY });
    assert.equal(still.lastSimulated, T0 + USECS_PER_SECOND / 2);
  });

  it('polls and clears dirty flags', () => {
    const t = setup();
    const entity = t.tree.addEntity({ properties: { velocity: { x: 2, y: 0, z: 0 }, damping: 0 } });

    const first = t.simulation.step(T0);
    assert.equal(first.dirty.get(entity.id), DIRTY_LINEAR_VELOCITY | DIRTY_MATERIAL);
    assert.equal(entity.getDirtyFlags(), 0);
    assert.equal(t.simulation.step(T0).dirty.size, 0);
  });

  it('mirrors a transform edit on the next step', () => {
    const t = setup();
    const entity = t.tree.addEntity();
    entity.setProperties({ position: { x: 7, y: 0, z: 0 } });
    assert.deepEqual(t.mirror.read(entity.id)?.position, { x: 0, y: 0, z: 0 });
    t.simulation.step(T0);
    assert.deepEqual(t.mirror.read(entity.id)?.position, { x: 7, y: 0, z: 0 });
  });

  it('reports ownership changes', () => {
    const t = setup();
    const changes: OwnershipChange[] = [];
    t.simulation.onOwnershipChange = (change) => changes.push(change);
    const entity = t.tree.addEntity();
    entity.setProperties({ simulationOwner: { id: SESSION, priority: 5 } });

    const result = t.simulation.step(T0);
    assert.deepEqual(result.ownershipChanges, [{ id: entity.id, owner: { id: SESSION, priority: 5 }, ours: true }]);
    assert.deepEqual(changes, result.ownershipChanges);
    assert.equal((result.dirty.get(entity.id) ?? 0) & DIRTY_SIMULATOR_ID, DIRTY_SIMULATOR_ID);
  });

  it('tracks actions of its entities', () => {
    const t = setup();
    const entity = t.tree.addEntity();
    const action = new ArgumentAction('acac0000-0000-4000-8000-000000000009', 1, entity.id);
    entity.addAction(t.simulation, action);
    assert.equal(t.simulation.hasAction(action.id), true);

    t.tree.deleteEntity(entity.id);
    assert.equal(t.simulation.actionCount, 0);
  });
});
