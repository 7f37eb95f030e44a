/**
 * Winding order helpers.
 *
 * Outline formats disagree on which winding is solid: TrueType contours wind
 * clockwise around filled area while CFF contours wind counter-clockwise.
 * Every classification here takes a `reverseWind` flag that is true for faces
 * without TrueType outlines.
 */

import type { Vec2 } from "../math/vec2";
import type { RingKind } from "./types";

/**
 * Twice the signed area of a closed polygon (shoelace sum).
 * Positive for counter-clockwise winding in a y-up space.
 */
export function signedArea(points: readonly Vec2[]): number {
  let sum = 0;
  for (let i = 0; i < points.length; i++) {
    const current = points[i]!;
    const next = points[(i + 1) % points.length]!;
    sum += current[0] * next[1] - next[0] * current[1];
  }
  return sum;
}

/** Zero area counts as counter-clockwise. */
export function isCounterClockwise(points: readonly Vec2[]): boolean {
  return signedArea(points) >= 0;
}

/** Classify a ring as filled area or a hole. */
export function classifyRing(ring: readonly Vec2[], reverseWind: boolean): RingKind {
  return isCounterClockwise(ring) !== reverseWind ? "hole" : "solid";
}

/**
 * Whether a quadratic segment bends into the filled area.
 *
 * A concave segment's control point lies inside the fill, so the flat polygon
 * must include it and the curve triangle removes the area outside the curve.
 */
export function isConcaveCurve(
  points: readonly [Vec2, Vec2, Vec2],
  reverseWind: boolean
): boolean {
  return isCounterClockwise(points) !== reverseWind;
}
