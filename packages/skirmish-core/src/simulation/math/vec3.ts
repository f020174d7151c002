import type { Vec3 } from "../../types.ts";

export const copy3 = (v: Readonly<Vec3>): Vec3 => [v[0], v[1], v[2]];

export const add3 = (a: Readonly<Vec3>, b: Readonly<Vec3>): Vec3 => [a[0] + b[0], a[1] + b[1], a[2] + b[2]];

export const sub3 = (a: Readonly<Vec3>, b: Readonly<Vec3>): Vec3 => [a[0] - b[0], a[1] - b[1], a[2] - b[2]];

export const scale3 = (v: Readonly<Vec3>, s: number): Vec3 => [v[0] * s, v[1] * s, v[2] * s];

export const dot3 = (a: Readonly<Vec3>, b: Readonly<Vec3>): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

export const length3 = (v: Readonly<Vec3>): number => Math.hypot(v[0], v[1], v[2]);

export const distance3 = (a: Readonly<Vec3>, b: Readonly<Vec3>): number => length3(sub3(a, b));

/** Returns null when the vector is too short to carry a direction. */
export const normalize3 = (v: Readonly<Vec3>, epsilon = 1e-6): Vec3 | null => {
  const len = length3(v);
  if (len < epsilon) {
    return null;
  }
  return [v[0] / len, v[1] / len, v[2] / len];
};
