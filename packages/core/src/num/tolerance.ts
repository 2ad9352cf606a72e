/**
 * Tolerance model and numeric context
 *
 * All equality/near-equality decisions in the connect pipeline go through
 * these helpers rather than raw comparisons.
 */

import type { Vec3 } from './vec3.js';

/**
 * Tolerance values for a repair pass
 */
export interface Tolerances {
  /** Coordinate, collinearity and parametric tolerance */
  length: number;
  /** Maximum difference between two average elevations still treated as one story */
  elevation: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default length tolerance. CAD exports in metres usually want 1e-4.
 */
export const DEFAULT_LENGTH_TOLERANCE = 1e-6;

/**
 * Elevation tolerance is looser than the length tolerance by this factor
 */
export const ELEVATION_TOLERANCE_FACTOR = 10;

/**
 * Elevation tolerance derived from a length tolerance: max(tol, 10·tol)
 */
export function defaultElevationTolerance(length: number): number {
  return Math.max(length, ELEVATION_TOLERANCE_FACTOR * length);
}

/**
 * Create a numeric context
 *
 * The elevation tolerance defaults to the one derived from `length`.
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  const length = tol?.length ?? DEFAULT_LENGTH_TOLERANCE;
  return {
    tol: {
      length,
      elevation: tol?.elevation ?? defaultElevationTolerance(length),
    },
  };
}

/**
 * Per-axis comparison of two points against an explicit tolerance
 */
export function eq3(a: Vec3, b: Vec3, tol: number): boolean {
  return (
    Math.abs(a[0] - b[0]) <= tol &&
    Math.abs(a[1] - b[1]) <= tol &&
    Math.abs(a[2] - b[2]) <= tol
  );
}

/**
 * Whether two average elevations belong to the same story
 */
export function sameElevation(z1: number, z2: number, ctx: NumericContext): boolean {
  return Math.abs(z1 - z2) <= ctx.tol.elevation;
}
