import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { RemoteEditInput } from '../src/TimestampReconciler.js';
import {
  adjustCreatedTime,
  adjustForSkew,
  deriveFromDelta,
  encodeDelta,
  reconcileRemoteEdit,
} from '../src/TimestampReconciler.js';

const NOW = 10_000_000;

function input(overrides: Partial<RemoteEditInput>): RemoteEditInput {
  return {
    remoteLastEdited: 5_000_000,
    clockSkew: 0,
    now: NOW,
    localLastEdited: 0,
    lastEditedFromRemote: 0,
    lastEditedFromRemoteInRemoteTime: 0,
    deleted: false,
    ...overrides,
  };
}

describe('reconcileRemoteEdit', () => {
  it('accepts an edit newer than the local one', () => {
    const decision = reconcileRemoteEdit(input({ localLastEdited: 4_000_000 }));
    assert.deepEqual(decision, { accept: true, lastEditedAdjusted: 5_000_000, sameRemoteEdit: false, reason: null });
  });

  it('rejects an edit older than the local one', () => {
    const decision = reconcileRemoteEdit(input({ localLastEdited: 6_000_000 }));
    assert.equal(decision.accept, false);
    assert.equal(decision.reason, 'older-than-local-edit');
  });

  it('subtracts clock skew before comparing', () => {
    // sender runs 2 s ahead: its 5 s is our 3 s, older than our 4 s edit
    const decision = reconcileRemoteEdit(input({ clockSkew: 2_000_000, localLastEdited: 4_000_000 }));
    assert.equal(decision.lastEditedAdjusted, 3_000_000);
    assert.equal(decision.accept, false);
  });

  it('clamps edits from the future to now', () => {
    const decision = reconcileRemoteEdit(input({ remoteLastEdited: 50_000_000 }));
    assert.equal(decision.lastEditedAdjusted, NOW);
    assert.equal(decision.accept, true);
  });

  it('accepts a repeat of the last accepted remote edit', () => {
    // local lastEdited was set to the adjusted remote time, which may exceed the raw one after clamping
    const decision = reconcileRemoteEdit(input({
      localLastEdited: 7_000_000,
      lastEditedFromRemote: 8_000_000,
      lastEditedFromRemoteInRemoteTime: 5_000_000,
    }));
    assert.equal(decision.sameRemoteEdit, true);
    assert.equal(decision.accept, true);
  });

  it('rejects a repeat once a local edit happened after it was accepted', () => {
    const decision = reconcileRemoteEdit(input({
      localLastEdited: 9_000_000,
      lastEditedFromRemote: 8_000_000,
      lastEditedFromRemoteInRemoteTime: 5_000_000,
    }));
    assert.equal(decision.reason, 'local-edit-since-same-remote-edit');
  });

  it('rejects anything for a deleted entity', () => {
    const decision = reconcileRemoteEdit(input({ deleted: true }));
    assert.equal(decision.accept, false);
    assert.equal(decision.reason, 'deleted');
  });
});

describe('timestamp helpers', () => {
  it('adjustForSkew never returns a time after now', () => {
    assert.equal(adjustForSkew(NOW + 5, 0, NOW), NOW);
    assert.equal(adjustForSkew(NOW, 100, NOW), NOW - 100);
  });

  it('adjustCreatedTime only fills an unknown created time', () => {
    assert.equal(adjustCreatedTime(1234, 5000, 0, NOW), 1234);
    assert.equal(adjustCreatedTime(0, 5000, 1000, NOW), 4000);
    assert.equal(adjustCreatedTime(0, 0, 0, NOW), NOW);
    assert.equal(adjustCreatedTime(0, NOW + 1, 0, NOW), NOW);
  });

  it('derives later times from deltas and clamps them to now', () => {
    assert.equal(deriveFromDelta(1000, 250, NOW), 1250);
    assert.equal(deriveFromDelta(NOW - 10, 250, NOW), NOW);
  });

  it('encodes non-positive deltas as zero', () => {
    assert.equal(encodeDelta(1000, 1500), 500);
    assert.equal(encodeDelta(1000, 900), 0);
  });
});
