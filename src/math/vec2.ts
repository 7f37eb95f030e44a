/**
 * 2D vector utilities for outline processing
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

/**
 * Midpoint of two points.
 * Returns a new vector (does not mutate input).
 */
export function midpoint(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + (b[0] - a[0]) / 2, a[1] + (b[1] - a[1]) / 2];
}

/** Exact component-wise equality */
export function equals(a: Vec2, b: Vec2): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/** True when both components are finite numbers */
export function isFinitePoint(v: Vec2): boolean {
  return Number.isFinite(v[0]) && Number.isFinite(v[1]);
}
