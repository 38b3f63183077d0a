// ── Vec3 ────────────────────────────────────────────────

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export function vec3(x = 0, y = 0, z = 0): Vec3 {
  return { x, y, z };
}

export function vec3Clone(v: Vec3): Vec3 {
  return { x: v.x, y: v.y, z: v.z };
}

export function vec3Equals(a: Vec3, b: Vec3): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function vec3Add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function vec3Sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function vec3Scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function vec3Mul(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x * b.x, y: a.y * b.y, z: a.z * b.z };
}

export function vec3Div(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x / b.x, y: a.y / b.y, z: a.z / b.z };
}

export function vec3Max(a: Vec3, b: Vec3): Vec3 {
  return { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y), z: Math.max(a.z, b.z) };
}

export function vec3Min(a: Vec3, b: Vec3): Vec3 {
  return { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y), z: Math.min(a.z, b.z) };
}

export function vec3Length(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

export function vec3IsZero(v: Vec3): boolean {
  return v.x === 0 && v.y === 0 && v.z === 0;
}

// ── Quat ────────────────────────────────────────────────

export interface Quat {
  x: number;
  y: number;
  z: number;
  w: number;
}

export function quatIdentity(): Quat {
  return { x: 0, y: 0, z: 0, w: 1 };
}

export function quatClone(q: Quat): Quat {
  return { x: q.x, y: q.y, z: q.z, w: q.w };
}

export function quatEquals(a: Quat, b: Quat): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z && a.w === b.w;
}

export function quatMul(a: Quat, b: Quat): Quat {
  return {
    x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
    y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
    z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w,
    w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
  };
}

/** Inverse rotation of a unit quaternion */
export function quatConjugate(q: Quat): Quat {
  return { x: -q.x, y: -q.y, z: -q.z, w: q.w };
}

export function quatNormalize(q: Quat): Quat {
  const len = Math.sqrt(q.x * q.x + q.y * q.y + q.z * q.z + q.w * q.w);
  if (len === 0) return quatIdentity();
  return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

export function quatRotateVec3(q: Quat, v: Vec3): Vec3 {
  // v + 2w(u×v) + 2u×(u×v)
  const ux = q.x, uy = q.y, uz = q.z;
  const cx = uy * v.z - uz * v.y;
  const cy = uz * v.x - ux * v.z;
  const cz = ux * v.y - uy * v.x;
  const ccx = uy * cz - uz * cy;
  const ccy = uz * cx - ux * cz;
  const ccz = ux * cy - uy * cx;
  return {
    x: v.x + 2 * (q.w * cx + ccx),
    y: v.y + 2 * (q.w * cy + ccy),
    z: v.z + 2 * (q.w * cz + ccz),
  };
}

// ── Transforms ──────────────────────────────────────────

/** Translation, rotation and per-axis scale, applied scale first */
export interface Transform {
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
}

// ── Bounding volumes ────────────────────────────────────

/** Axis-aligned cube: minimum corner + edge length */
export interface AACube {
  corner: Vec3;
  scale: number;
}

/** Axis-aligned box: minimum corner + edge lengths */
export interface AABox {
  corner: Vec3;
  dimensions: Vec3;
}

/** Box around the eight corners of `[min, max]` after rotating about the origin and shifting. */
export function rotatedExtents(min: Vec3, max: Vec3, rotation: Quat, shift: Vec3): AABox {
  let lo = vec3(Infinity, Infinity, Infinity);
  let hi = vec3(-Infinity, -Infinity, -Infinity);
  for (let i = 0; i < 8; i++) {
    const corner = vec3(i & 1 ? max.x : min.x, i & 2 ? max.y : min.y, i & 4 ? max.z : min.z);
    const p = vec3Add(quatRotateVec3(rotation, corner), shift);
    lo = vec3Min(lo, p);
    hi = vec3Max(hi, p);
  }
  return { corner: lo, dimensions: vec3Sub(hi, lo) };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
