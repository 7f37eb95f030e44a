/**
 * Shaper over opentype.js.
 *
 * Maps text through the cmap and the substitutions opentype.js applies, then
 * folds pair kerning into each glyph's advance. No vertical advances or mark
 * offsets are produced.
 */

import { ShapingError } from "../errors";
import type { GlyphAdvance } from "../types";
import { OpenTypeFace } from "./OpenTypeFace";
import type { FontFace, Shaper } from "./types";

export interface OpenTypeShaperOptions {
  /** Apply pair kerning (default: true) */
  kerning?: boolean;
}

export class OpenTypeShaper implements Shaper {
  readonly kerning: boolean;

  constructor(options: OpenTypeShaperOptions = {}) {
    this.kerning = options.kerning ?? true;
  }

  shape(face: FontFace, text: string): GlyphAdvance[] {
    if (!(face instanceof OpenTypeFace)) {
      throw new ShapingError(text, `face ${face.id} was not loaded with opentype.js`);
    }

    const font = face.font;
    const glyphs = font.stringToGlyphs(text);

    return glyphs.map((glyph, i) => {
      let xAdvance = glyph.advanceWidth ?? 0;
      const next = glyphs[i + 1];
      if (this.kerning && next) {
        xAdvance += font.getKerningValue(glyph, next);
      }
      return {
        glyphId: glyph.index,
        xAdvance,
        yAdvance: 0,
        xOffset: 0,
        yOffset: 0,
      };
    });
  }
}
