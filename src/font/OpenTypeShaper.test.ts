import { describe, it, expect, vi } from "vitest";
import * as opentype from "opentype.js";
import { OpenTypeShaper } from "./OpenTypeShaper";
import { loadFontFace, type OpenTypeFace } from "./OpenTypeFace";
import { ShapingError } from "../errors";
import { createFakeFace } from "../testing/fakes";

function buildTestFace(): OpenTypeFace {
  const box = new opentype.Path();
  box.moveTo(0, 0);
  box.lineTo(500, 0);
  box.lineTo(500, 500);
  box.lineTo(0, 500);
  box.close();

  const font = new opentype.Font({
    familyName: "Shaper Test",
    styleName: "Regular",
    unitsPerEm: 1000,
    ascender: 800,
    descender: -200,
    glyphs: [
      new opentype.Glyph({ name: ".notdef", unicode: 0, advanceWidth: 500, path: new opentype.Path() }),
      new opentype.Glyph({ name: "space", unicode: 32, advanceWidth: 250, path: new opentype.Path() }),
      new opentype.Glyph({ name: "A", unicode: 65, advanceWidth: 600, path: box }),
      new opentype.Glyph({ name: "V", unicode: 86, advanceWidth: 650, path: box }),
    ],
  });
  return loadFontFace(font.toArrayBuffer());
}

describe("OpenTypeShaper", () => {
  it("maps characters to glyphs with their advances", () => {
    const face = buildTestFace();

    const glyphs = new OpenTypeShaper().shape(face, "A V");

    expect(glyphs).toEqual([
      { glyphId: 2, xAdvance: 600, yAdvance: 0, xOffset: 0, yOffset: 0 },
      { glyphId: 1, xAdvance: 250, yAdvance: 0, xOffset: 0, yOffset: 0 },
      { glyphId: 3, xAdvance: 650, yAdvance: 0, xOffset: 0, yOffset: 0 },
    ]);
  });

  it("returns no glyphs for empty text", () => {
    expect(new OpenTypeShaper().shape(buildTestFace(), "")).toEqual([]);
  });

  it("folds pair kerning into the left glyph's advance", () => {
    const face = buildTestFace();
    const kerning = vi.spyOn(face.font, "getKerningValue").mockReturnValue(-80);

    const kerned = new OpenTypeShaper().shape(face, "AV");

    expect(kerned.map((g) => g.xAdvance)).toEqual([520, 650]);
    expect(kerning).toHaveBeenCalledTimes(1);
  });

  it("can skip kerning", () => {
    const face = buildTestFace();
    const kerning = vi.spyOn(face.font, "getKerningValue").mockReturnValue(-80);

    const plain = new OpenTypeShaper({ kerning: false }).shape(face, "AV");

    expect(plain.map((g) => g.xAdvance)).toEqual([600, 650]);
    expect(kerning).not.toHaveBeenCalled();
  });

  it("rejects faces it cannot read", () => {
    const face = createFakeFace({ id: "fake" });

    expect(() => new OpenTypeShaper().shape(face, "A")).toThrow(ShapingError);
    expect(() => new OpenTypeShaper().shape(face, "A")).toThrow(
      'Failed to shape "A": face fake was not loaded with opentype.js'
    );
  });
});
