/**
 * Glyph mesh builder.
 *
 * Turns one glyph outline into an immutable triangle mesh: the flat fill
 * polygons are triangulated with earcut and every quadratic segment adds a
 * curve triangle whose UVs drive the implicit `u² - v` test in the fragment
 * shader.
 */

import type { FontFace } from "../font/types";
import { collectOutline } from "../outline/OutlineCollector";
import type { CurveTriangle } from "../outline/types";
import { groupRings, tessellatePolygon } from "../geometry/tessellate";
import { signedArea } from "../geometry/winding";
import type { Ring, ShapeGroup } from "../geometry/types";
import { isFinitePoint, type Vec2 } from "../math/vec2";
import { DegenerateGeometryError } from "../errors";
import {
  METADATA_CONCAVE,
  METADATA_CURVE,
  type Color,
  type GlyphMesh,
  type Vertex,
} from "../types";

/** Color given to glyph vertices before layout stamps the span color */
export const DEFAULT_GLYPH_COLOR: Color = [0.18, 0.76, 0.93, 1];

/** UVs of a curve triangle's start, control and end vertices */
export const CURVE_UVS: readonly [Vec2, Vec2, Vec2] = [
  [0, 0],
  [0.5, 0],
  [1, 1],
];

export interface TriangulatedGlyph {
  vertices: Vertex[];
  indices: number[];
}

export class GlyphMeshBuilder {
  readonly face: FontFace;

  constructor(face: FontFace) {
    this.face = face;
  }

  /**
   * Build the mesh for a glyph.
   *
   * @returns The mesh, or null when the glyph has no outline
   * @throws DegenerateGeometryError when the outline cannot be triangulated
   */
  build(glyphId: number): GlyphMesh | null {
    const outline = this.face.outline(glyphId);
    if (!outline) return null;

    const collector = collectOutline(outline.commands, this.face.reverseWind);
    const { vertices, indices } = triangulateGlyph(
      glyphId,
      collector.rings,
      collector.curves,
      this.face.reverseWind
    );

    return {
      glyphId,
      vertices,
      indices,
      bounds: { ...outline.bounds },
    };
  }
}

/**
 * Triangulate collected rings and curves into one vertex/index list.
 *
 * Flat fill comes first, one earcut pass per outer ring with its holes;
 * curve triangles follow with three vertices each.
 */
export function triangulateGlyph(
  glyphId: number,
  rings: readonly Ring[],
  curves: readonly CurveTriangle[],
  reverseWind: boolean
): TriangulatedGlyph {
  const grouped = groupRings(rings, reverseWind);
  if (!grouped.groups) {
    throw new DegenerateGeometryError(
      glyphId,
      `hole contour ${grouped.orphanIndex} precedes any outer contour`
    );
  }

  const vertices: Vertex[] = [];
  const indices: number[] = [];

  for (const group of grouped.groups) {
    assertTriangulable(glyphId, group);

    const result = tessellatePolygon(group.outer, group.holes);
    if (result.indices.length === 0) {
      throw new DegenerateGeometryError(glyphId, "triangulation produced no triangles");
    }

    const indexOffset = vertices.length;
    for (const index of result.indices) {
      indices.push(index + indexOffset);
    }
    for (let i = 0; i < result.coords.length; i += 2) {
      vertices.push({
        position: [result.coords[i]!, result.coords[i + 1]!, 0],
        uv: [0, 0],
        metadata: 0,
        color: [...DEFAULT_GLYPH_COLOR],
      });
    }
  }

  for (const curve of curves) {
    if (!curve.points.every(isFinitePoint)) {
      throw new DegenerateGeometryError(glyphId, "curve has non-finite coordinates");
    }
    const base = vertices.length;
    indices.push(base, base + 1, base + 2);
    const metadata = METADATA_CURVE | (curve.concave ? METADATA_CONCAVE : 0);
    curve.points.forEach(([x, y], corner) => {
      const [u, v] = CURVE_UVS[corner]!;
      vertices.push({
        position: [x, y, 0],
        uv: [u, v],
        metadata,
        color: [...DEFAULT_GLYPH_COLOR],
      });
    });
  }

  return { vertices, indices };
}

function assertTriangulable(glyphId: number, group: ShapeGroup): void {
  for (const ring of [group.outer, ...group.holes]) {
    if (!ring.every(isFinitePoint)) {
      throw new DegenerateGeometryError(glyphId, "contour has non-finite coordinates");
    }
  }
  if (signedArea(group.outer) === 0) {
    throw new DegenerateGeometryError(glyphId, "outer contour has zero area");
  }
}
