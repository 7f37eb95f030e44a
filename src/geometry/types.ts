/**
 * Geometry types
 */

import type { Vec2 } from "../math/vec2";

/** Closed ring of points; the last point connects back to the first */
export type Ring = Vec2[];

/** Outer ring with the holes cut out of it */
export interface ShapeGroup {
  outer: Ring;
  holes: Ring[];
}

/** Tessellated polygon result with vertices and indices */
export interface TessellatedPolygon {
  /** Interleaved coordinates [x, y, x, y, ...], outer ring first, then holes */
  coords: number[];
  /** Triangle indices into coords (per point, not per component) */
  indices: number[];
}

/** Winding classification of a ring relative to a face's convention */
export type RingKind = "solid" | "hole";
