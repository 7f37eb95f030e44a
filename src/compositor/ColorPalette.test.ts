import { describe, it, expect } from "vitest";
import { ColorPalette } from "./ColorPalette";

describe("ColorPalette", () => {
  it("assigns indices in first-seen order", () => {
    const palette = new ColorPalette();

    expect(palette.indexOf([1, 0, 0, 1])).toBe(0);
    expect(palette.indexOf([0, 1, 0, 1])).toBe(1);
    expect(palette.indexOf([0, 0, 1, 1])).toBe(2);
    expect(palette.size).toBe(3);
  });

  it("reuses the index of an equal color", () => {
    const palette = new ColorPalette();
    palette.indexOf([0, 0, 0, 1]);
    palette.indexOf([1, 1, 1, 1]);

    expect(palette.indexOf([0, 0, 0, 1])).toBe(0);
    expect(palette.size).toBe(2);
  });

  it("treats colors differing only in alpha as distinct", () => {
    const palette = new ColorPalette();

    expect(palette.indexOf([0, 0, 0, 1])).toBe(0);
    expect(palette.indexOf([0, 0, 0, 0.5])).toBe(1);
  });

  it("looks up colors by index", () => {
    const palette = new ColorPalette();
    palette.indexOf([0.25, 0.5, 0.75, 1]);

    expect(palette.has([0.25, 0.5, 0.75, 1])).toBe(true);
    expect(palette.has([0.25, 0.5, 0.75, 0])).toBe(false);
    expect(palette.get(0)).toEqual([0.25, 0.5, 0.75, 1]);
    expect(palette.get(1)).toBeUndefined();
  });

  it("keeps its entries when callers mutate inputs or outputs", () => {
    const palette = new ColorPalette();
    const color: [number, number, number, number] = [1, 0, 0, 1];
    palette.indexOf(color);
    color[0] = 0;

    const colors = palette.colors;
    colors[0]![1] = 1;

    expect(palette.colors).toEqual([[1, 0, 0, 1]]);
  });
});
