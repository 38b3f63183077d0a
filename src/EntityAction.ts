import { DecodeError } from './errors.js';
import { ProtocolDecoder, ProtocolEncoder } from './Protocol.js';
import type { EntityId } from './types.js';

export type ActionArguments = Record<string, unknown>;

/**
 * Behavioural modifier attached to one entity. Its serialized form is opaque
 * to the ledger apart from the leading type tag and id.
 */
export interface EntityAction {
  readonly id: EntityId;
  readonly type: number;
  /** Back-reference by id; null once detached */
  ownerEntityId: EntityId | null;
  /** Set when added locally, cleared once the authoritative copy echoes it */
  locallyAddedButNotYetReceived: boolean;
  serialize(): Uint8Array;
  /** Throws DecodeError on malformed data */
  deserialize(data: Uint8Array): void;
  updateArguments(args: ActionArguments): boolean;
  getArguments(): ActionArguments;
  shouldSuppressLocationEdits(): boolean;
  isActive(): boolean;
}

/** The part of the simulation an action mutation needs. Always passed explicitly. */
export interface ActionSimulation {
  addAction(action: EntityAction): void;
  removeAction(action: EntityAction): void;
}

export interface ActionFactory {
  /** null when the blob is malformed or its type is unknown */
  create(ownerEntityId: EntityId, data: Uint8Array): EntityAction | null;
}

// ── Blob header ─────────────────────────────────────────

export interface ActionHeader {
  type: number;
  id: EntityId;
}

export function writeActionHeader(encoder: ProtocolEncoder, header: ActionHeader) {
  encoder.writeVarint(header.type);
  encoder.writeUuid(header.id);
}

export function readActionHeader(decoder: ProtocolDecoder): ActionHeader {
  const type = decoder.readVarint();
  const id = decoder.readUuid();
  return { type, id };
}

// ── Argument-carrying action ────────────────────────────

/** Action whose whole payload is its argument map, as JSON. */
export class ArgumentAction implements EntityAction {
  ownerEntityId: EntityId | null;
  locallyAddedButNotYetReceived = false;
  protected args: ActionArguments;

  constructor(
    readonly id: EntityId,
    readonly type: number,
    ownerEntityId: EntityId | null,
    args: ActionArguments = {},
  ) {
    this.ownerEntityId = ownerEntityId;
    this.args = { ...args };
  }

  serialize(): Uint8Array {
    const encoder = new ProtocolEncoder();
    writeActionHeader(encoder, { type: this.type, id: this.id });
    encoder.writeString(JSON.stringify(this.args));
    return encoder.finishBytes();
  }

  deserialize(data: Uint8Array): void {
    const decoder = new ProtocolDecoder(data);
    const header = readActionHeader(decoder);
    if (header.type !== this.type || header.id !== this.id) {
      throw new DecodeError(`Action data for ${header.type}/${header.id} applied to ${this.type}/${this.id}`, 0);
    }
    const start = decoder.position;
    const text = decoder.readString();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new DecodeError('Action arguments are not JSON', start);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new DecodeError('Action arguments must be an object', start);
    }
    this.args = { ...parsed };
  }

  updateArguments(args: ActionArguments): boolean {
    this.args = { ...this.args, ...args };
    return true;
  }

  getArguments(): ActionArguments {
    return { ...this.args };
  }

  shouldSuppressLocationEdits(): boolean {
    return false;
  }

  isActive(): boolean {
    return this.ownerEntityId !== null;
  }
}

// ── Factory registry ────────────────────────────────────

export interface ActionRegistration {
  type: number;
  name: string;
  create(id: EntityId, ownerEntityId: EntityId): EntityAction;
}

export interface ActionRegistry extends ActionFactory {
  typeName(type: number): string | undefined;
  byName(name: string): ActionRegistration | undefined;
}

export function createActionFactory(registrations: ActionRegistration[]): ActionRegistry {
  const byType = new Map<number, ActionRegistration>();
  const byNameMap = new Map<string, ActionRegistration>();
  for (const reg of registrations) {
    if (byType.has(reg.type)) throw new Error(`Duplicate action type ${reg.type} ("${reg.name}")`);
    if (byNameMap.has(reg.name)) throw new Error(`Duplicate action name "${reg.name}"`);
    byType.set(reg.type, reg);
    byNameMap.set(reg.name, reg);
  }

  return {
    create(ownerEntityId, data) {
      const decoder = new ProtocolDecoder(data);
      let header: ActionHeader;
      try {
        header = readActionHeader(decoder);
      } catch (err) {
        if (err instanceof DecodeError) return null;
        throw err;
      }
      const reg = byType.get(header.type);
      if (!reg) return null;

      const action = reg.create(header.id, ownerEntityId);
      try {
        action.deserialize(data);
      } catch (err) {
        if (err instanceof DecodeError) return null;
        throw err;
      }
      return action;
    },

    typeName(type) {
      return byType.get(type)?.name;
    },

    byName(name) {
      return byNameMap.get(name);
    },
  };
}
