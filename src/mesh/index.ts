/**
 * Glyph mesh construction and caching
 */

export {
  GlyphMeshBuilder,
  triangulateGlyph,
  DEFAULT_GLYPH_COLOR,
  CURVE_UVS,
  type TriangulatedGlyph,
} from "./GlyphMeshBuilder";
export { GlyphMeshCache, type GlyphMeshCacheOptions } from "./GlyphMeshCache";
