/**
 * Color palette
 *
 * Ordered set of distinct RGBA colors. Colors are deduplicated by exact
 * channel equality and keep the order they were first seen in.
 */

import type { Color } from "../types";

function colorKey(color: Color): string {
  return `${color[0]}:${color[1]}:${color[2]}:${color[3]}`;
}

export class ColorPalette {
  private entries: Color[] = [];
  private indices = new Map<string, number>();

  /** Index of a color, adding it when unseen */
  indexOf(color: Color): number {
    const key = colorKey(color);
    const existing = this.indices.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.entries.length;
    this.entries.push([color[0], color[1], color[2], color[3]]);
    this.indices.set(key, index);
    return index;
  }

  /** Whether a color is already in the palette */
  has(color: Color): boolean {
    return this.indices.has(colorKey(color));
  }

  get(index: number): Color | undefined {
    return this.entries[index];
  }

  get size(): number {
    return this.entries.length;
  }

  /** Copy of the palette in index order */
  get colors(): Color[] {
    return this.entries.map((c) => [c[0], c[1], c[2], c[3]]);
  }
}
