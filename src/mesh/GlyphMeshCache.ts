/**
 * Glyph mesh cache keyed by face identity and glyph id.
 *
 * Meshes are immutable, so a cached mesh can back any number of spans.
 * Glyphs without an outline are cached as null; degenerate glyphs are not
 * cached and fail again on the next lookup.
 */

import type { FontFace } from "../font/types";
import type { GlyphMesh } from "../types";
import { GlyphMeshBuilder } from "./GlyphMeshBuilder";

export interface GlyphMeshCacheOptions {
  /** Maximum number of entries before the oldest is evicted (default: 4096) */
  limit?: number;
}

export class GlyphMeshCache {
  readonly limit: number;

  private entries = new Map<string, GlyphMesh | null>();
  private builders = new WeakMap<FontFace, GlyphMeshBuilder>();
  private _hits = 0;
  private _misses = 0;

  constructor(options: GlyphMeshCacheOptions = {}) {
    this.limit = options.limit ?? 4096;
  }

  /** Return the cached mesh or build it. */
  get(face: FontFace, glyphId: number): GlyphMesh | null {
    const key = `${face.id}:${glyphId}`;
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this._hits++;
      // Refresh recency
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    this._misses++;
    const mesh = this.builderFor(face).build(glyphId);
    this.entries.set(key, mesh);
    if (this.entries.size > this.limit) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
      }
    }
    return mesh;
  }

  /** Number of cached glyphs */
  get size(): number {
    return this.entries.size;
  }

  get hits(): number {
    return this._hits;
  }

  get misses(): number {
    return this._misses;
  }

  clear(): void {
    this.entries.clear();
    this._hits = 0;
    this._misses = 0;
  }

  private builderFor(face: FontFace): GlyphMeshBuilder {
    let builder = this.builders.get(face);
    if (!builder) {
      builder = new GlyphMeshBuilder(face);
      this.builders.set(face, builder);
    }
    return builder;
  }
}
