/**
 * Text mesh builder.
 *
 * Places glyph meshes along a cursor driven by shaping advances and maps
 * every vertex from font units into normalized device coordinates of the
 * target texture.
 */

import type { Vec2 } from "../math/vec2";
import type { Color, GlyphAdvance, GlyphMesh, TextMesh, Vertex } from "../types";
import { EM_CORRECTION } from "./constants";

export interface TextMeshBuilderOptions {
  /** Units per em of the face the meshes came from */
  unitsPerEm: number;
  /** Font size in pixels */
  fontSize: number;
  /** Target texture size in pixels */
  textureSize: [number, number];
  /** Text origin in pixels from the bottom-left corner (default: [0, 0]) */
  origin?: Vec2;
  /** Em correction factor (default: EM_CORRECTION) */
  emCorrection?: number;
  /** Color stamped on every vertex: RGBA or a palette index (default: keep the mesh's) */
  color?: Color | number;
}

export class TextMeshBuilder {
  readonly fontSize: number;
  readonly origin: Vec2;
  readonly textureSize: [number, number];
  /** Font units to pixels */
  readonly scale: number;

  private color?: Color | number;
  private vertices: Vertex[] = [];
  private indices: number[] = [];
  private _cursor: Vec2 = [0, 0];
  private _glyphCount = 0;

  constructor(options: TextMeshBuilderOptions) {
    this.fontSize = options.fontSize;
    this.origin = options.origin ?? [0, 0];
    this.textureSize = options.textureSize;
    this.color = options.color;
    this.scale =
      (options.fontSize / options.unitsPerEm) *
      (options.emCorrection ?? EM_CORRECTION);
  }

  /** Running cursor in font units */
  get cursor(): Vec2 {
    return [this._cursor[0], this._cursor[1]];
  }

  /** Number of glyphs added, with or without a mesh */
  get glyphCount(): number {
    return this._glyphCount;
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  /**
   * Place one shaped glyph at the cursor and advance it.
   * Glyphs without a mesh still consume their advance.
   */
  add(mesh: GlyphMesh | null, advance: GlyphAdvance): void {
    if (mesh) {
      const indexOffset = this.vertices.length;
      for (const index of mesh.indices) {
        this.indices.push(index + indexOffset);
      }

      const dx = this._cursor[0] + advance.xOffset;
      const dy = this._cursor[1] + advance.yOffset;
      for (const vertex of mesh.vertices) {
        this.vertices.push({
          position: [
            this.toDevice(vertex.position[0] + dx, 0),
            this.toDevice(vertex.position[1] + dy, 1),
            vertex.position[2],
          ],
          uv: [vertex.uv[0], vertex.uv[1]],
          metadata: vertex.metadata,
          color: copyColor(this.color ?? vertex.color),
        });
      }
    }

    this._cursor[0] += advance.xAdvance;
    this._cursor[1] += advance.yAdvance;
    this._glyphCount++;
  }

  /** Return the accumulated mesh */
  build(): TextMesh {
    return { vertices: [...this.vertices], indices: [...this.indices] };
  }

  /** Font units on one axis to normalized device coordinates */
  private toDevice(value: number, axis: 0 | 1): number {
    const dimension = this.textureSize[axis];
    const pixels = value * this.scale;
    return (pixels / dimension) * 2 - 1 + (this.origin[axis] / dimension) * 2;
  }
}

function copyColor(color: Color | number): Color | number {
  return typeof color === "number" ? color : [color[0], color[1], color[2], color[3]];
}
