/**
 * Core mesh and layout types shared across modules
 */

import type { Vec2 } from "./math/vec2";

/** RGBA color, each channel 0-1 */
export type Color = [number, number, number, number];

/** Position with a z placeholder */
export type Vec3 = [number, number, number];

/** Axis-aligned rectangle in font design units */
export interface Rect {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

/** Metadata bit set on the three vertices of a curve triangle */
export const METADATA_CURVE = 0b10;
/** Metadata bit set when a curve triangle carves out of the fill */
export const METADATA_CONCAVE = 0b01;

/**
 * A single mesh vertex.
 *
 * `color` is an inline RGBA color, or a palette index when the mesh was
 * produced by the compositor.
 */
export interface Vertex {
  position: Vec3;
  uv: Vec2;
  /** 0 for flat fill, METADATA_CURVE (| METADATA_CONCAVE) for curve triangles */
  metadata: number;
  color: Color | number;
}

/** Triangulated outline of one glyph, in font design units */
export interface GlyphMesh {
  readonly glyphId: number;
  readonly vertices: readonly Vertex[];
  readonly indices: readonly number[];
  /** Bounding box advertised by the font, independent of layout */
  readonly bounds: Rect;
}

/** One shaped glyph, in font design units */
export interface GlyphAdvance {
  glyphId: number;
  xAdvance: number;
  yAdvance: number;
  xOffset: number;
  yOffset: number;
}

/** Flattened mesh of laid out text, in normalized device coordinates */
export interface TextMesh {
  vertices: Vertex[];
  indices: number[];
}
