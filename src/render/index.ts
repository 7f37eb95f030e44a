/**
 * GPU packing and the WebGL2 rasterization backend
 */

export {
  packTextMesh,
  FLOATS_PER_VERTEX,
  VERTEX_STRIDE,
  VERTEX_ATTRIBUTES,
  type PackedTextMesh,
  type VertexAttribute,
} from "./pack";
export { GpuMesh } from "./GpuMesh";
export {
  GlyphRenderer,
  DEFAULT_CLEAR_COLOR,
  type GlyphRendererOptions,
} from "./GlyphRenderer";
export {
  glyphVertexShader,
  glyphFragmentShader,
  MAX_PALETTE_COLORS,
  MAX_INSTANCES,
  instanceWeights,
} from "./shaders/glyph";
export {
  createGlyphProgram,
  type GlyphProgram,
  type GlyphUniforms,
  type GlyphShaderSources,
} from "./shaders/program";
