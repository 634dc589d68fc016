/**
 * Vector Math Module
 *
 * Pure functions on Vec3 (world points) and PlanarVec (ground-plane x/z).
 * No classes, no mutation. Every function returns a new vector or scalar.
 * Trig and square roots go through detmath so results are reproducible
 * across instances.
 */

import type { Vec3, PlanarVec } from './types';
import { sinDeg, cosDeg, sqrt } from './detmath';

export type { Vec3, PlanarVec } from './types';

/** Create a new Vec3. */
export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

/** Create a new PlanarVec. */
export function planar(x: number, z: number): PlanarVec {
  return { x, z };
}

/** Vector addition: a + b. */
export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

/** Vector subtraction: a - b. */
export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

/** Scalar multiplication: v * s. */
export function scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

/** Linear interpolation: a + (b - a) * t. */
export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

/** Squared ground-plane distance -- avoids sqrt when only comparing. */
export function distanceSqXZ(a: PlanarVec, b: PlanarVec): number {
  const dx = a.x - b.x;
  const dz = a.z - b.z;
  return dx * dx + dz * dz;
}

/** Ground-plane distance, ignoring height. */
export function distanceXZ(a: PlanarVec, b: PlanarVec): number {
  return sqrt(distanceSqXZ(a, b));
}

/** Unit forward vector for a heading in degrees. 0 = +z, 90 = +x. */
export function forwardXZ(headingDeg: number): PlanarVec {
  return { x: sinDeg(headingDeg), z: cosDeg(headingDeg) };
}

/** Unit right vector for a heading in degrees (forward rotated a quarter turn clockwise). */
export function rightXZ(headingDeg: number): PlanarVec {
  return { x: cosDeg(headingDeg), z: -sinDeg(headingDeg) };
}

/** Move a point along the ground plane: p + dir * dist. Height unchanged. */
export function advanceXZ(p: Vec3, dir: PlanarVec, dist: number): Vec3 {
  return { x: p.x + dir.x * dist, y: p.y, z: p.z + dir.z * dist };
}
