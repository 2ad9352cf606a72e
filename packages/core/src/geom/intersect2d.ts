/**
 * Plan-view segment intersection
 */

import type { Vec2 } from '../num/vec2.js';
import { cross2, isFinite2, sub2 } from '../num/vec2.js';

/**
 * A proper or touching intersection between two segments
 */
export interface SegmentHit {
  /** Intersection point, evaluated on the first segment */
  point: Vec2;
  /** Parameter along p1→p2, clamped to [0, 1] */
  t: number;
  /** Parameter along q1→q2, clamped to [0, 1] */
  u: number;
}

function clamp01(v: number): number {
  return Math.min(Math.max(v, 0), 1);
}

/**
 * Intersect segment p1→p2 with segment q1→q2 in plan
 *
 * Solves p1 + t·(p2 - p1) = q1 + u·(q2 - q1). Returns null when the
 * determinant is within `tol` of zero (parallel, collinear or degenerate
 * segments), when either parameter falls outside [-tol, 1 + tol], or when the
 * resulting point is not finite. Touching endpoints count as hits.
 */
export function intersectSegmentsXY(
  p1: Vec2,
  p2: Vec2,
  q1: Vec2,
  q2: Vec2,
  tol: number
): SegmentHit | null {
  const dp = sub2(p2, p1);
  const dq = sub2(q2, q1);
  const det = cross2(dp, dq);
  if (Math.abs(det) <= tol) {
    return null;
  }

  const r = sub2(q1, p1);
  const t = cross2(r, dq) / det;
  const u = cross2(r, dp) / det;
  if (t < -tol || t > 1 + tol || u < -tol || u > 1 + tol) {
    return null;
  }

  const tc = clamp01(t);
  const uc = clamp01(u);
  const point: Vec2 = [p1[0] + tc * dp[0], p1[1] + tc * dp[1]];
  if (!isFinite2(point)) {
    return null;
  }
  return { point, t: tc, u: uc };
}
