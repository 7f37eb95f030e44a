import { describe, it, expect } from "vitest";
import { TextMeshBuilder } from "./TextMeshBuilder";
import { EM_CORRECTION } from "./constants";
import type { GlyphAdvance, GlyphMesh } from "../types";

const TEXTURE: [number, number] = [200, 100];

// 1000 units per em at 100px with no correction: 0.1px per unit
function createBuilder(extra: { origin?: [number, number]; color?: number } = {}) {
  return new TextMeshBuilder({
    unitsPerEm: 1000,
    fontSize: 100,
    textureSize: TEXTURE,
    emCorrection: 1,
    ...extra,
  });
}

function triangleMesh(glyphId = 1): GlyphMesh {
  return {
    glyphId,
    vertices: [
      { position: [0, 0, 0], uv: [0, 0], metadata: 0, color: [1, 0, 0, 1] },
      { position: [10, 0, 0], uv: [0, 0], metadata: 0, color: [1, 0, 0, 1] },
      { position: [10, 10, 0], uv: [1, 1], metadata: 0b10, color: [1, 0, 0, 1] },
    ],
    indices: [0, 1, 2],
    bounds: { xMin: 0, yMin: 0, xMax: 10, yMax: 10 },
  };
}

function advance(xAdvance: number, extra: Partial<GlyphAdvance> = {}): GlyphAdvance {
  return { glyphId: 1, xAdvance, yAdvance: 0, xOffset: 0, yOffset: 0, ...extra };
}

describe("TextMeshBuilder", () => {
  it("builds an empty mesh when nothing was added", () => {
    const mesh = createBuilder().build();
    expect(mesh.vertices).toEqual([]);
    expect(mesh.indices).toEqual([]);
  });

  it("maps the first glyph from font units to device coordinates", () => {
    const builder = createBuilder();
    builder.add(triangleMesh(), advance(500));
    const { vertices } = builder.build();

    expect(vertices[0]?.position[0]).toBeCloseTo(-1);
    expect(vertices[0]?.position[1]).toBeCloseTo(-1);
    // 10 units = 1px; 1 / 200 * 2 - 1
    expect(vertices[1]?.position[0]).toBeCloseTo(-0.99);
    // 1px of 100 tall
    expect(vertices[2]?.position[1]).toBeCloseTo(-0.98);
    expect(vertices[2]?.uv).toEqual([1, 1]);
    expect(vertices[2]?.metadata).toBe(0b10);
  });

  it("re-indexes and shifts later glyphs by the cursor", () => {
    const builder = createBuilder();
    builder.add(triangleMesh(), advance(500));
    builder.add(triangleMesh(), advance(500));
    const { vertices, indices } = builder.build();

    expect(indices).toEqual([0, 1, 2, 3, 4, 5]);
    // 500 units = 50px
    expect(vertices[3]?.position[0]).toBeCloseTo(-0.5);
  });

  it("advances the cursor for glyphs without a mesh", () => {
    const builder = createBuilder();
    builder.add(null, advance(300));
    builder.add(triangleMesh(), advance(500));
    const { vertices, indices } = builder.build();

    expect(vertices).toHaveLength(3);
    expect(indices).toEqual([0, 1, 2]);
    expect(vertices[0]?.position[0]).toBeCloseTo(-0.7);
    expect(builder.cursor).toEqual([800, 0]);
    expect(builder.glyphCount).toBe(2);
  });

  it("sums x and y advances exactly", () => {
    const builder = createBuilder();
    const advances = [
      advance(120, { yAdvance: 5 }),
      advance(0, { yAdvance: -2 }),
      advance(333, { yAdvance: 7 }),
    ];
    builder.add(triangleMesh(), advances[0]!);
    builder.add(null, advances[1]!);
    builder.add(triangleMesh(), advances[2]!);

    expect(builder.cursor).toEqual([453, 10]);
  });

  it("adds the origin in device space", () => {
    const builder = createBuilder({ origin: [20, 10] });
    builder.add(triangleMesh(), advance(500));
    const { vertices } = builder.build();

    expect(vertices[0]?.position[0]).toBeCloseTo(-0.8);
    expect(vertices[0]?.position[1]).toBeCloseTo(-0.8);
  });

  it("applies shaping offsets without moving the cursor", () => {
    const builder = createBuilder();
    builder.add(triangleMesh(), advance(500, { xOffset: 20, yOffset: -10 }));
    const { vertices } = builder.build();

    // 2px right, 1px down
    expect(vertices[0]?.position[0]).toBeCloseTo(-0.98);
    expect(vertices[0]?.position[1]).toBeCloseTo(-1.02);
    expect(builder.cursor).toEqual([500, 0]);
  });

  it("stamps the configured color on every vertex", () => {
    const builder = createBuilder({ color: 3 });
    builder.add(triangleMesh(), advance(500));

    expect(builder.build().vertices.map((v) => v.color)).toEqual([3, 3, 3]);
  });

  it("keeps the mesh color when none is configured", () => {
    const builder = createBuilder();
    builder.add(triangleMesh(), advance(500));

    expect(builder.build().vertices[0]?.color).toEqual([1, 0, 0, 1]);
  });

  it("gives every output vertex its own color", () => {
    const mesh = triangleMesh();
    const builder = createBuilder();
    builder.add(mesh, advance(500));

    const [first, second] = builder.build().vertices;
    if (first && Array.isArray(first.color)) first.color[0] = 9;

    expect(second?.color).toEqual([1, 0, 0, 1]);
    expect(mesh.vertices[0]?.color).toEqual([1, 0, 0, 1]);
  });

  it("uses the em correction constant by default", () => {
    const builder = new TextMeshBuilder({
      unitsPerEm: 1000,
      fontSize: 100,
      textureSize: TEXTURE,
    });
    expect(builder.scale).toBeCloseTo(0.1 * EM_CORRECTION);
    expect(EM_CORRECTION).toBe(1.254);
  });

  it("leaves the source mesh untouched", () => {
    const mesh = triangleMesh();
    const builder = createBuilder();
    builder.add(mesh, advance(500));
    builder.add(mesh, advance(500));

    expect(mesh.vertices[1]?.position).toEqual([10, 0, 0]);
  });
});
