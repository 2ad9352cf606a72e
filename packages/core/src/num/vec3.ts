/**
 * 3D points
 *
 * Node positions are tuples [x, y, z]; z is the elevation.
 */

import type { Vec2 } from './vec2.js';

export type Vec3 = [number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Drop the elevation, keeping the plan projection
 */
export function toPlan(p: Vec3): Vec2 {
  return [p[0], p[1]];
}

/**
 * Midpoint elevation of two points
 */
export function meanZ(a: Vec3, b: Vec3): number {
  return (a[2] + b[2]) * 0.5;
}
