import type { Vec3 } from "../../types.ts";

const TWO_PI = Math.PI * 2;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Wraps into (-PI, PI]. */
export function wrapAngle(angle: number): number {
  const wrapped = angle - TWO_PI * Math.floor((angle + Math.PI) / TWO_PI);
  return wrapped <= -Math.PI ? wrapped + TWO_PI : wrapped;
}

export function forwardFromOrientation(orientation: Readonly<Vec3>): Vec3 {
  const pitch = orientation[1];
  const yaw = orientation[2];
  return [Math.cos(pitch) * Math.cos(yaw), Math.cos(pitch) * Math.sin(yaw), Math.sin(pitch)];
}

export function clampSpeed(velocity: Vec3, maxSpeed: number): Vec3 {
  const speed = Math.hypot(velocity[0], velocity[1], velocity[2]);
  if (speed <= maxSpeed) {
    return velocity;
  }
  const scale = maxSpeed / speed;
  return [velocity[0] * scale, velocity[1] * scale, velocity[2] * scale];
}
