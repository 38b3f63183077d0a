import { DecodeError } from './errors.js';
import type { EntityId } from './types.js';

export const UUID_BYTES = 16;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/** RFC 4122 byte order (big-endian fields, as written in the string) */
export function uuidToBytes(id: EntityId, out: Uint8Array = new Uint8Array(UUID_BYTES), offset = 0): Uint8Array {
  if (!isUuid(id)) throw new Error(`Not a UUID: "${id}"`);
  const hex = id.replace(/-/g, '');
  for (let i = 0; i < UUID_BYTES; i++) {
    out[offset + i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function bytesToUuid(bytes: Uint8Array, offset = 0): EntityId {
  if (offset + UUID_BYTES > bytes.length) {
    throw new DecodeError('Truncated UUID', offset);
  }
  let hex = '';
  for (let i = 0; i < UUID_BYTES; i++) {
    hex += bytes[offset + i].toString(16).padStart(2, '0');
  }
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
