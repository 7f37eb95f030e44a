/**
 * Span compositing
 */

export { ColorPalette } from "./ColorPalette";
export {
  Compositor,
  SUBPIXEL_OFFSETS,
  type Composition,
  type RasterBackend,
  type RasterBatch,
} from "./Compositor";
