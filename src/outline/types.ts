/**
 * Outline command and curve types
 */

import type { Vec2 } from "../math/vec2";
import type { Rect } from "../types";

/** One outline drawing event, in font design units (y up) */
export type OutlineCommand =
  | { type: "M"; x: number; y: number }
  | { type: "L"; x: number; y: number }
  | { type: "Q"; x1: number; y1: number; x: number; y: number }
  | { type: "C"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { type: "Z" };

/** Materialized outline of a glyph */
export interface GlyphOutline {
  commands: OutlineCommand[];
  bounds: Rect;
}

/**
 * One quadratic segment rendered by the implicit curve test.
 * Points are start, control, end.
 */
export interface CurveTriangle {
  points: [Vec2, Vec2, Vec2];
  /** Control point lies inside the fill */
  concave: boolean;
}
