/**
 * Plan-view predicates
 *
 * Collinearity is evaluated with Shewchuk-style adaptive precision
 * predicates (mourner/robust-predicates), so the area compared against the
 * tolerance is not polluted by cancellation for nearly collinear points.
 */

import type { Vec2 } from './vec2.js';
import { dot2, lengthSq2, sub2 } from './vec2.js';
import { orient2d } from 'robust-predicates';

/**
 * Twice the signed area of triangle abc, i.e. cross(b - a, c - a)
 *
 * robust-predicates uses the opposite sign convention, so the result is negated.
 */
export function signedArea2(a: Vec2, b: Vec2, c: Vec2): number {
  return -orient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

/**
 * True when c lies on the infinite line through a and b (|area| <= tol)
 */
export function collinearXY(a: Vec2, b: Vec2, c: Vec2, tol: number): boolean {
  return Math.abs(signedArea2(a, b, c)) <= tol;
}

/**
 * Scalar projection of p onto a→b, normalised by the squared length.
 * A degenerate segment (a == b) yields 0.
 */
export function paramOnSegmentXY(a: Vec2, b: Vec2, p: Vec2): number {
  const ab = sub2(b, a);
  const denom = lengthSq2(ab);
  if (denom === 0) {
    return 0;
  }
  return dot2(sub2(p, a), ab) / denom;
}

/**
 * Collinear with a→b and projected inside [-tol, 1 + tol]
 */
export function pointOnSegmentXY(a: Vec2, b: Vec2, p: Vec2, tol: number): boolean {
  if (!collinearXY(a, b, p, tol)) {
    return false;
  }
  const t = paramOnSegmentXY(a, b, p);
  return t >= -tol && t <= 1 + tol;
}
