/**
 * Error types raised by the mesh and layout pipeline
 */

/** Base class for all pipeline errors */
export class GlyphMeshError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A glyph outline could not be triangulated.
 *
 * Recoverable: layout skips the glyph and keeps its advance.
 */
export class DegenerateGeometryError extends GlyphMeshError {
  readonly glyphId: number;

  constructor(glyphId: number, reason: string) {
    super(`Glyph ${glyphId} has degenerate geometry: ${reason}`);
    this.glyphId = glyphId;
  }
}

/** Font bytes could not be parsed into a face */
export class InvalidFontDataError extends GlyphMeshError {}

/** The shaper could not process a span's text */
export class ShapingError extends GlyphMeshError {
  readonly text: string;

  constructor(text: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to shape "${text}": ${reason}`, options);
    this.text = text;
  }
}
