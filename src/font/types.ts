/**
 * Font collaborator interfaces
 */

import type { GlyphOutline } from "../outline/types";
import type { GlyphAdvance } from "../types";

/** A loaded, parsed font face. Shared by reference, never mutated by layout. */
export interface FontFace {
  /** Stable identity used for mesh caching */
  readonly id: string;
  readonly unitsPerEm: number;
  /**
   * True when the face has no TrueType contour table, so its contours wind
   * the opposite way (CFF / CFF2 outlines).
   */
  readonly reverseWind: boolean;
  /** Outline of a glyph, or null for glyphs without one (e.g. space) */
  outline(glyphId: number): GlyphOutline | null;
}

/** Text shaping: codepoints to positioned glyph ids */
export interface Shaper {
  shape(face: FontFace, text: string): GlyphAdvance[];
}
