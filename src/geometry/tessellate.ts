/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import type { Ring, ShapeGroup, TessellatedPolygon } from "./types";
import { classifyRing } from "./winding";

/**
 * Tessellate a polygon (with optional holes) into triangles.
 *
 * @param outer - Outer ring coordinates [[x,y], [x,y], ...]
 * @param holes - Optional array of hole rings
 * @returns Flattened coordinates and triangle indices
 */
export function tessellatePolygon(
  outer: Ring,
  holes: Ring[] = []
): TessellatedPolygon {
  // Flatten coordinates for earcut
  const coords: number[] = [];
  const holeIndices: number[] = [];

  for (const [x, y] of outer) {
    coords.push(x, y);
  }

  for (const hole of holes) {
    holeIndices.push(coords.length / 2);
    for (const [x, y] of hole) {
      coords.push(x, y);
    }
  }

  const indices = earcut(
    coords,
    holeIndices.length > 0 ? holeIndices : undefined,
    2
  );

  return { coords, indices };
}

/**
 * Group rings into outer shapes and their holes, in encounter order.
 *
 * Each solid ring starts a new group and each hole attaches to the most
 * recently started group. Returns `null` as the groups when a hole comes
 * before any solid ring, with the offending ring's index.
 */
export function groupRings(
  rings: readonly Ring[],
  reverseWind: boolean
): { groups: ShapeGroup[] } | { groups: null; orphanIndex: number } {
  const groups: ShapeGroup[] = [];

  for (let i = 0; i < rings.length; i++) {
    const ring = rings[i]!;
    if (classifyRing(ring, reverseWind) === "solid") {
      groups.push({ outer: ring, holes: [] });
      continue;
    }

    const current = groups[groups.length - 1];
    if (!current) {
      return { groups: null, orphanIndex: i };
    }
    current.holes.push(ring);
  }

  return { groups };
}
