/**
 * Layout constants
 */

/**
 * Scale applied on top of `fontSize / unitsPerEm` so that rendered glyphs
 * match the reference cap height for a given pixel size. Tuned by eye, not
 * derived from font metrics; override per layout context when needed.
 */
export const EM_CORRECTION = 1.254;

/** Pixels per typographic point, at 150 dpi */
export const POINTS_TO_PIXELS = 150 / 72;

/** Convert a size in points to pixels at 150 dpi */
export function pointsToPixels(points: number): number {
  return points * POINTS_TO_PIXELS;
}
