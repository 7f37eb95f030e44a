/**
 * Compositor
 *
 * Batches several spans into one vertex/index buffer for a single draw.
 * Span colors are deduplicated into a palette and every vertex refers to its
 * span's color by palette index. Spans are concatenated in submission order,
 * so later spans draw over earlier ones.
 */

import type { Span, LayoutContext } from "../text/Span";
import type { Color, TextMesh } from "../types";
import { packTextMesh, type PackedTextMesh } from "../render/pack";
import { ColorPalette } from "./ColorPalette";

/**
 * Horizontal offsets in pixels of the three instances drawn for subpixel
 * antialiasing.
 */
export const SUBPIXEL_OFFSETS: readonly number[] = [-1 / 3, 1 / 3, 0];

/** Everything a rasterization backend needs for one draw */
export interface RasterBatch {
  mesh: PackedTextMesh;
  palette: Color[];
  /** Horizontal offset in pixels of each drawn instance */
  instanceOffsets: readonly number[];
  /** Output size in pixels */
  textureSize: [number, number];
}

/**
 * Draws a batch and returns RGBA8 pixels, rows bottom to top.
 * Blocks until the pixels are available.
 */
export interface RasterBackend {
  draw(batch: RasterBatch): Uint8Array;
}

export interface Composition {
  mesh: TextMesh;
  palette: Color[];
}

export class Compositor {
  private spans: Span[] = [];

  /** Queue a span; spans draw in the order they were added */
  add(span: Span): this {
    this.spans.push(span);
    return this;
  }

  addAll(spans: Iterable<Span>): this {
    for (const span of spans) {
      this.spans.push(span);
    }
    return this;
  }

  get count(): number {
    return this.spans.length;
  }

  clear(): void {
    this.spans = [];
  }

  /**
   * Lay out every span and merge the meshes.
   * @throws ShapingError when a span's text cannot be shaped
   */
  compose(context: LayoutContext): Composition {
    const palette = new ColorPalette();
    const vertices: TextMesh["vertices"] = [];
    const indices: number[] = [];

    for (const span of this.spans) {
      const paletteIndex = palette.indexOf(span.color);
      const mesh = span.generateTextMesh(context, paletteIndex);

      const indexOffset = vertices.length;
      for (const index of mesh.indices) {
        indices.push(index + indexOffset);
      }
      for (const vertex of mesh.vertices) {
        vertices.push(vertex);
      }
    }

    return { mesh: { vertices, indices }, palette: palette.colors };
  }

  /** Compose and hand the batch to a backend for a single draw */
  render(context: LayoutContext, backend: RasterBackend): Uint8Array {
    const { mesh, palette } = this.compose(context);
    return backend.draw({
      mesh: packTextMesh(mesh),
      palette,
      instanceOffsets: SUBPIXEL_OFFSETS,
      textureSize: context.textureSize,
    });
  }
}
