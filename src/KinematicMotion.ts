import type { Quat, Vec3 } from './math.js';
import { clamp, quatMul, quatNormalize, vec3, vec3Add, vec3IsZero, vec3Length, vec3Scale } from './math.js';

export const MIN_TIME_SKIP = 0;
/** Longest single extrapolation step, seconds */
export const MAX_TIME_SKIP = 1;
/** Fixed physics sub-step, seconds */
export const PHYSICS_ENGINE_FIXED_SUBSTEP = 1 / 90;
/** 0.1 degrees/sec */
export const EPSILON_ANGULAR_VELOCITY_LENGTH = 0.0017453;
/** 1 mm/sec */
export const EPSILON_LINEAR_VELOCITY_LENGTH = 0.001;

const ANGULAR_MOTION_THRESHOLD = 0.5 * Math.PI;

export interface KinematicState {
  position: Vec3;
  rotation: Quat;
  velocity: Vec3;
  angularVelocity: Vec3;
  acceleration: Vec3;
  damping: number;
  angularDamping: number;
}

export interface KinematicResult {
  position: Vec3;
  rotation: Quat;
  velocity: Vec3;
  angularVelocity: Vec3;
  /** A non-zero velocity was snapped to rest (only reported when flags are wanted) */
  motionTypeChanged: boolean;
}

/**
 * Incremental rotation for one step, matching the approximation rigid-body
 * integrators use: speed is capped at a quarter turn per step, and very slow
 * spins use the Taylor expansion of sin(x/2)/x.
 */
export function computeRotationStep(angularVelocity: Vec3, dt: number): Quat {
  let speed = vec3Length(angularVelocity);
  if (speed * dt > ANGULAR_MOTION_THRESHOLD) {
    speed = ANGULAR_MOTION_THRESHOLD / dt;
  }
  let axis: Vec3;
  if (speed < 0.001) {
    axis = vec3Scale(angularVelocity, 0.5 * dt - (dt * dt * dt) * 0.020833333333 * speed * speed);
  } else {
    axis = vec3Scale(angularVelocity, Math.sin(0.5 * speed * dt) / speed);
  }
  return { x: axis.x, y: axis.y, z: axis.z, w: Math.cos(0.5 * speed * dt) };
}

export function simulateKinematicMotion(state: KinematicState, timeElapsed: number, setFlags: boolean): KinematicResult {
  const dt = clamp(timeElapsed, MIN_TIME_SKIP, MAX_TIME_SKIP);

  let rotation = state.rotation;
  let angularVelocity = state.angularVelocity;
  let position = state.position;
  let velocity = state.velocity;
  let motionTypeChanged = false;

  if (!vec3IsZero(angularVelocity)) {
    if (state.angularDamping > 0) {
      angularVelocity = vec3Scale(angularVelocity, Math.pow(1 - state.angularDamping, dt));
    }

    const angularSpeed = vec3Length(angularVelocity);
    if (angularSpeed < EPSILON_ANGULAR_VELOCITY_LENGTH) {
      if (setFlags && angularSpeed > 0) motionTypeChanged = true;
      angularVelocity = vec3();
    } else {
      let remaining = dt;
      while (remaining > PHYSICS_ENGINE_FIXED_SUBSTEP) {
        rotation = quatNormalize(quatMul(computeRotationStep(angularVelocity, PHYSICS_ENGINE_FIXED_SUBSTEP), rotation));
        remaining -= PHYSICS_ENGINE_FIXED_SUBSTEP;
      }
      rotation = quatNormalize(quatMul(computeRotationStep(angularVelocity, remaining), rotation));
    }
  }

  if (!vec3IsZero(velocity)) {
    let v = velocity;
    if (state.damping > 0) {
      v = vec3Scale(v, Math.pow(1 - state.damping, dt));
    }

    const newPosition = vec3Add(position, vec3Scale(v, dt));

    // acceleration feeds the next step, not this one
    if (!vec3IsZero(state.acceleration)) {
      v = vec3Add(v, vec3Scale(state.acceleration, dt));
    }

    const speed = vec3Length(v);
    if (speed < EPSILON_LINEAR_VELOCITY_LENGTH) {
      velocity = vec3();
      if (setFlags && speed > 0) motionTypeChanged = true;
    } else {
      position = newPosition;
      velocity = v;
    }
  }

  return { position, rotation, velocity, angularVelocity, motionTypeChanged };
}
