import { DecodeError } from './errors.js';

// Unsigned counts, 7 bits per byte, low group first, high bit = "more follows".
// Values stay within Number.MAX_SAFE_INTEGER (53 bits → at most 8 bytes).

export const MAX_COUNT_BYTES = 8;

const GROUP = 0x80;

function assertCount(value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Count must be a non-negative safe integer (got ${value})`);
  }
}

export function countCodedLength(value: number): number {
  assertCount(value);
  let length = 1;
  let rest = Math.floor(value / GROUP);
  while (rest > 0) {
    length++;
    rest = Math.floor(rest / GROUP);
  }
  return length;
}

/** Writes `value` at `offset`, returns the number of bytes written */
export function writeCount(target: Uint8Array, offset: number, value: number): number {
  assertCount(value);
  let rest = value;
  let i = offset;
  // Arithmetic, not bitwise: timestamp deltas exceed 32 bits.
  while (rest >= GROUP) {
    target[i++] = (rest % GROUP) | GROUP;
    rest = Math.floor(rest / GROUP);
  }
  target[i++] = rest;
  return i - offset;
}

export function encodeCount(value: number): Uint8Array {
  const out = new Uint8Array(countCodedLength(value));
  writeCount(out, 0, value);
  return out;
}

/**
 * Non-minimal encodings (e.g. 0x80 0x00 for zero) are accepted as long as
 * they stay within MAX_COUNT_BYTES.
 */
export function readCount(bytes: Uint8Array, offset: number): { value: number; length: number } {
  let value = 0;
  let scale = 1;
  for (let i = 0; i < MAX_COUNT_BYTES; i++) {
    const at = offset + i;
    if (at >= bytes.length) throw new DecodeError('Truncated count', offset);
    const b = bytes[at];
    value += (b & 0x7F) * scale;
    if ((b & GROUP) === 0) {
      if (!Number.isSafeInteger(value)) throw new DecodeError('Count exceeds safe integer range', offset);
      return { value, length: i + 1 };
    }
    scale *= GROUP;
  }
  throw new DecodeError(`Count longer than ${MAX_COUNT_BYTES} bytes`, offset);
}
