/**
 * Interleaved GPU layout for text meshes.
 *
 * Vertex format: position (3) + uv (2) + metadata (1) + color (4)
 * = 10 floats = 40 bytes. Palette-indexed vertices store the index in the
 * first color component and zeros in the rest.
 */

import type { TextMesh } from "../types";

export const FLOATS_PER_VERTEX = 10;
export const VERTEX_STRIDE = FLOATS_PER_VERTEX * 4;

/** Shader attribute locations and byte offsets of the packed layout */
export interface VertexAttribute {
  location: number;
  size: number;
  offset: number;
}

export const VERTEX_ATTRIBUTES: readonly VertexAttribute[] = [
  { location: 0, size: 3, offset: 0 }, // a_position
  { location: 1, size: 2, offset: 12 }, // a_uv
  { location: 2, size: 1, offset: 20 }, // a_metadata
  { location: 3, size: 4, offset: 24 }, // a_color
];

export interface PackedTextMesh {
  vertices: Float32Array;
  indices: Uint16Array | Uint32Array;
  vertexCount: number;
  /** True when vertex colors are palette indices */
  paletteIndexed: boolean;
}

/**
 * Interleave a mesh for upload.
 * Indices fit in 16 bits unless the mesh has more than 65535 vertices.
 */
export function packTextMesh(mesh: TextMesh): PackedTextMesh {
  const vertexCount = mesh.vertices.length;
  const vertices = new Float32Array(vertexCount * FLOATS_PER_VERTEX);
  let paletteIndexed = false;

  mesh.vertices.forEach((vertex, i) => {
    const base = i * FLOATS_PER_VERTEX;
    vertices[base] = vertex.position[0];
    vertices[base + 1] = vertex.position[1];
    vertices[base + 2] = vertex.position[2];
    vertices[base + 3] = vertex.uv[0];
    vertices[base + 4] = vertex.uv[1];
    vertices[base + 5] = vertex.metadata;
    if (typeof vertex.color === "number") {
      paletteIndexed = true;
      vertices[base + 6] = vertex.color;
    } else {
      vertices.set(vertex.color, base + 6);
    }
  });

  const indices =
    vertexCount > 65535
      ? new Uint32Array(mesh.indices)
      : new Uint16Array(mesh.indices);

  return { vertices, indices, vertexCount, paletteIndexed };
}
