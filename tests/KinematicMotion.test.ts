import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { KinematicState } from '../src/KinematicMotion.js';
import { computeRotationStep, simulateKinematicMotion } from '../src/KinematicMotion.js';
import { quatIdentity, vec3 } from '../src/math.js';

function state(overrides: Partial<KinematicState>): KinematicState {
  return {
    position: vec3(),
    rotation: quatIdentity(),
    velocity: vec3(),
    angularVelocity: vec3(),
    acceleration: vec3(),
    damping: 0,
    angularDamping: 0,
    ...overrides,
  };
}

function near(actual: number, expected: number, eps = 1e-9) {
  assert.ok(Math.abs(actual - expected) < eps, `${actual} != ${expected}`);
}

describe('simulateKinematicMotion', () => {
  it('integrates position without damping', () => {
    const result = simulateKinematicMotion(state({ velocity: vec3(2, 0, -1) }), 0.5, true);
    assert.deepEqual(result.position, { x: 1, y: 0, z: -0.5 });
    assert.deepEqual(result.velocity, { x: 2, y: 0, z: -1 });
    assert.equal(result.motionTypeChanged, false);
  });

  it('clamps elapsed time to one second', () => {
    const result = simulateKinematicMotion(state({ velocity: vec3(1, 0, 0) }), 5, true);
    assert.equal(result.position.x, 1);
  });

  it('treats negative elapsed time as zero', () => {
    const result = simulateKinematicMotion(state({ velocity: vec3(1, 0, 0) }), -3, true);
    assert.equal(result.position.x, 0);
  });

  it('applies damping before moving', () => {
    const result = simulateKinematicMotion(state({ velocity: vec3(4, 0, 0), damping: 0.75 }), 0.5, false);
    // 4 * 0.25^0.5 = 2
    near(result.position.x, 1);
    near(result.velocity.x, 2);
  });

  it('adds acceleration to the velocity for the next step only', () => {
    const result = simulateKinematicMotion(state({ velocity: vec3(1, 0, 0), acceleration: vec3(0, -10, 0) }), 0.5, true);
    assert.deepEqual(result.position, { x: 0.5, y: 0, z: 0 });
    assert.deepEqual(result.velocity, { x: 1, y: -5, z: 0 });
  });

  it('snaps tiny velocities to rest and reports it when flags are wanted', () => {
    const slow = state({ velocity: vec3(0.0005, 0, 0) });
    const flagged = simulateKinematicMotion(slow, 0.1, true);
    assert.deepEqual(flagged.velocity, { x: 0, y: 0, z: 0 });
    assert.deepEqual(flagged.position, { x: 0, y: 0, z: 0 });
    assert.equal(flagged.motionTypeChanged, true);
    assert.equal(simulateKinematicMotion(slow, 0.1, false).motionTypeChanged, false);
  });

  it('snaps tiny angular velocities to rest', () => {
    const result = simulateKinematicMotion(state({ angularVelocity: vec3(0, 0.001, 0) }), 0.1, true);
    assert.deepEqual(result.angularVelocity, { x: 0, y: 0, z: 0 });
    assert.deepEqual(result.rotation, quatIdentity());
    assert.equal(result.motionTypeChanged, true);
  });

  it('rotates by speed times elapsed time across sub-steps', () => {
    const result = simulateKinematicMotion(state({ angularVelocity: vec3(0, Math.PI / 2, 0) }), 1, false);
    // quarter turn about y
    near(result.rotation.y, Math.sin(Math.PI / 4), 1e-6);
    near(result.rotation.w, Math.cos(Math.PI / 4), 1e-6);
    near(result.rotation.x, 0, 1e-9);
  });

  it('stays within speed times elapsed of the start', () => {
    const s = state({ velocity: vec3(3, 4, 0), damping: 0.2, acceleration: vec3(0, 0, 9) });
    const result = simulateKinematicMotion(s, 0.8, true);
    const dist = Math.hypot(result.position.x, result.position.y, result.position.z);
    assert.ok(dist <= 5 * 0.8 + 1e-9);
  });

  it('leaves a body at rest untouched', () => {
    const s = state({ position: vec3(1, 2, 3) });
    const result = simulateKinematicMotion(s, 0.5, true);
    assert.deepEqual(result.position, { x: 1, y: 2, z: 3 });
    assert.deepEqual(result.rotation, quatIdentity());
  });
});

describe('computeRotationStep', () => {
  it('returns identity for zero spin', () => {
    assert.deepEqual(computeRotationStep(vec3(), 0.1), { x: 0, y: 0, z: 0, w: 1 });
  });

  it('uses the series expansion for very slow spins', () => {
    const q = computeRotationStep(vec3(0.0005, 0, 0), 1);
    near(q.x, Math.sin(0.00025), 1e-14);
    near(q.w, Math.cos(0.00025), 1e-14);
  });
});
