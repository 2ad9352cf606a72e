/**
 * 2D vector operations
 *
 * Plan-view geometry works on tuples [x, y]. All operations are pure functions.
 */

export type Vec2 = [number, number];

/**
 * Create a 2D vector
 */
export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}

/**
 * Subtract two vectors: a - b
 */
export function sub2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

/**
 * Dot product: a · b
 */
export function dot2(a: Vec2, b: Vec2): number {
  return a[0] * b[0] + a[1] * b[1];
}

/**
 * Cross product (2D): z-component of the 3D cross product, u.x*v.y - u.y*v.x
 */
export function cross2(a: Vec2, b: Vec2): number {
  return a[0] * b[1] - a[1] * b[0];
}

/**
 * Squared length of vector
 */
export function lengthSq2(v: Vec2): number {
  return v[0] * v[0] + v[1] * v[1];
}

export function isFinite2(v: Vec2): boolean {
  return Number.isFinite(v[0]) && Number.isFinite(v[1]);
}
