import { UNKNOWN_CREATED_TIME } from './types.js';

export interface RemoteEditInput {
  /** lastEdited exactly as carried in the packet, in the sender's clock */
  remoteLastEdited: number;
  /** sender clock minus receiver clock, µs */
  clockSkew: number;
  now: number;
  localLastEdited: number;
  /** Receiver time at which the last remote edit was accepted */
  lastEditedFromRemote: number;
  /** Raw remote timestamp of the last accepted remote edit */
  lastEditedFromRemoteInRemoteTime: number;
  /** The receiver has independently deleted this entity */
  deleted: boolean;
}

export type RejectReason = 'deleted' | 'local-edit-since-same-remote-edit' | 'older-than-local-edit';

export interface RemoteEditDecision {
  accept: boolean;
  /** Remote edit time in the receiver's clock, never later than now */
  lastEditedAdjusted: number;
  sameRemoteEdit: boolean;
  reason: RejectReason | null;
}

export function adjustForSkew(remoteTime: number, clockSkew: number, now: number): number {
  return Math.min(remoteTime - clockSkew, now);
}

/**
 * Decides whether a remote record overwrites local state.
 *
 * A packet carrying the same raw remote edit time as the last accepted one is
 * a retransmission or a spillover continuation of that edit; it only loses to
 * a local edit made after that acceptance. Any other packet must not be older
 * than the local edit clock.
 */
export function reconcileRemoteEdit(input: RemoteEditInput): RemoteEditDecision {
  const lastEditedAdjusted = adjustForSkew(input.remoteLastEdited, input.clockSkew, input.now);
  const sameRemoteEdit = input.remoteLastEdited === input.lastEditedFromRemoteInRemoteTime;

  let reason: RejectReason | null = null;
  if (input.deleted) {
    reason = 'deleted';
  } else if (sameRemoteEdit) {
    if (input.localLastEdited > input.lastEditedFromRemote) reason = 'local-edit-since-same-remote-edit';
  } else if (input.localLastEdited > lastEditedAdjusted) {
    reason = 'older-than-local-edit';
  }

  return { accept: reason === null, lastEditedAdjusted, sameRemoteEdit, reason };
}

/** Only an unknown created time is ever filled in from a remote record. */
export function adjustCreatedTime(localCreated: number, remoteCreated: number, clockSkew: number, now: number): number {
  if (localCreated !== UNKNOWN_CREATED_TIME) return localCreated;
  const adjusted = remoteCreated - clockSkew;
  if (remoteCreated === UNKNOWN_CREATED_TIME || adjusted > now) return now;
  return adjusted;
}

/** lastUpdated / lastSimulated travel as deltas from lastEdited */
export function deriveFromDelta(lastEditedAdjusted: number, delta: number, now: number): number {
  return Math.min(lastEditedAdjusted + delta, now);
}

export function encodeDelta(lastEdited: number, later: number): number {
  return later <= lastEdited ? 0 : later - lastEdited;
}
