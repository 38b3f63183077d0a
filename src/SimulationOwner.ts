import { DecodeError } from './errors.js';
import type { EntityId } from './types.js';
import { NULL_ID } from './types.js';
import { bytesToUuid, UUID_BYTES, uuidToBytes } from './uuid.js';

export const SIMULATION_OWNER_BYTES = UUID_BYTES + 1;

export interface SimulationOwnerData {
  id: EntityId;
  priority: number;
}

/**
 * Which peer integrates an entity's motion. Whoever asserted ownership most
 * recently wins; there is no timestamp comparison.
 */
export class SimulationOwner {
  private _id: EntityId;
  private _priority: number;

  constructor(id: EntityId = NULL_ID, priority = 0) {
    this._id = id;
    this._priority = priority & 0xFF;
  }

  get id(): EntityId {
    return this._id;
  }

  get priority(): number {
    return this._priority;
  }

  isNull(): boolean {
    return this._id === NULL_ID;
  }

  matchesValidId(id: EntityId): boolean {
    return !this.isNull() && this._id === id;
  }

  /** Returns true when anything changed */
  set(other: SimulationOwnerData): boolean {
    const priority = other.priority & 0xFF;
    if (this._id === other.id && this._priority === priority) return false;
    this._id = other.id;
    this._priority = priority;
    return true;
  }

  clear() {
    this._id = NULL_ID;
    this._priority = 0;
  }

  equals(other: SimulationOwnerData): boolean {
    return this._id === other.id && this._priority === (other.priority & 0xFF);
  }

  toData(): SimulationOwnerData {
    return { id: this._id, priority: this._priority };
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(SIMULATION_OWNER_BYTES);
    uuidToBytes(this._id, out, 0);
    out[UUID_BYTES] = this._priority;
    return out;
  }

  static fromBytes(bytes: Uint8Array): SimulationOwner {
    if (bytes.byteLength !== SIMULATION_OWNER_BYTES) {
      throw new DecodeError(`Simulation owner must be ${SIMULATION_OWNER_BYTES} bytes (got ${bytes.byteLength})`, 0);
    }
    return new SimulationOwner(bytesToUuid(bytes, 0), bytes[UUID_BYTES]);
  }

  toString(): string {
    return `${this._id}:${this._priority}`;
  }
}
