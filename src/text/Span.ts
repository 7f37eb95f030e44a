/**
 * Span: one styled, positioned and aligned run of shaped text.
 *
 * Spans are immutable values. Every `with*` call returns a new span, so a
 * configured span can be reused or handed to a compositor freely.
 */

import type { FontFace, Shaper } from "../font/types";
import type { GlyphMeshCache } from "../mesh/GlyphMeshCache";
import { GlyphMeshBuilder } from "../mesh/GlyphMeshBuilder";
import { DegenerateGeometryError, ShapingError } from "../errors";
import type { Vec2 } from "../math/vec2";
import type { Color, GlyphAdvance, GlyphMesh, TextMesh } from "../types";
import { EM_CORRECTION, pointsToPixels } from "./constants";
import { TextMeshBuilder } from "./TextMeshBuilder";

/** Placement of content inside its box along one axis */
export type Align = "start" | "middle" | "end";

export interface SpanOptions {
  text: string;
  face: FontFace;
  /** Origin in pixels from the bottom-left corner of the texture */
  position: Vec2;
  /** Font size in pixels */
  fontSize: number;
  /** Box [width, height] in pixels the text is aligned within */
  box?: [number, number];
  hAlign: Align;
  vAlign: Align;
  color: Color;
}

export type SpanStyle = Omit<SpanOptions, "text" | "face">;

export const DEFAULT_SPAN_STYLE: SpanStyle = {
  position: [0, 0],
  fontSize: 16,
  hAlign: "start",
  vAlign: "start",
  color: [0, 0, 0, 1],
};

/** Collaborators and output settings shared by every span in a layout */
export interface LayoutContext {
  shaper: Shaper;
  /** Target texture size in pixels */
  textureSize: [number, number];
  /** Em correction factor (default: EM_CORRECTION) */
  emCorrection?: number;
  /** Reuse glyph meshes across spans */
  cache?: GlyphMeshCache;
}

export interface SpanMeasurement {
  /** Total advance width in pixels */
  width: number;
  /** Content height in pixels (the font size) */
  height: number;
}

export class Span {
  readonly options: Readonly<SpanOptions>;

  private constructor(options: SpanOptions) {
    this.options = options;
  }

  static create(text: string, face: FontFace, style: Partial<SpanStyle> = {}): Span {
    const { position, box, color, ...rest } = { ...DEFAULT_SPAN_STYLE, ...style };
    const options: SpanOptions = {
      ...rest,
      text,
      face,
      position: [position[0], position[1]],
      color: [color[0], color[1], color[2], color[3]],
    };
    if (box) options.box = [box[0], box[1]];
    return new Span(options);
  }

  get text(): string {
    return this.options.text;
  }

  get face(): FontFace {
    return this.options.face;
  }

  get color(): Color {
    return this.options.color;
  }

  get fontSize(): number {
    return this.options.fontSize;
  }

  withText(text: string): Span {
    return new Span({ ...this.options, text });
  }

  withFace(face: FontFace): Span {
    return new Span({ ...this.options, face });
  }

  withPosition(x: number, y: number): Span {
    return new Span({ ...this.options, position: [x, y] });
  }

  /** Font size in pixels */
  withFontSize(pixels: number): Span {
    return new Span({ ...this.options, fontSize: pixels });
  }

  /** Font size in points, converted at 150 dpi */
  withFontSizePoints(points: number): Span {
    return this.withFontSize(pointsToPixels(points));
  }

  withBox(width: number, height: number): Span {
    return new Span({ ...this.options, box: [width, height] });
  }

  withoutBox(): Span {
    const { box: _box, ...rest } = this.options;
    return new Span(rest);
  }

  withAlignment(hAlign: Align, vAlign: Align): Span {
    return new Span({ ...this.options, hAlign, vAlign });
  }

  withHorizontalAlign(hAlign: Align): Span {
    return new Span({ ...this.options, hAlign });
  }

  withVerticalAlign(vAlign: Align): Span {
    return new Span({ ...this.options, vAlign });
  }

  withColor(color: Color): Span {
    return new Span({ ...this.options, color: [...color] });
  }

  /** Font units to pixels for this span's size */
  scale(context: LayoutContext): number {
    return (
      (this.options.fontSize / this.options.face.unitsPerEm) *
      (context.emCorrection ?? EM_CORRECTION)
    );
  }

  /**
   * Shape the span's text.
   * @throws ShapingError when the shaper rejects the text
   */
  shape(context: LayoutContext): GlyphAdvance[] {
    try {
      return context.shaper.shape(this.options.face, this.options.text);
    } catch (err) {
      if (err instanceof ShapingError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ShapingError(this.options.text, reason, { cause: err });
    }
  }

  measure(context: LayoutContext): SpanMeasurement {
    return this.measureGlyphs(context, this.shape(context));
  }

  /**
   * Origin after aligning content of the given width inside the box.
   * Without a box the position is returned unchanged.
   */
  resolveOrigin(contentWidth: number): Vec2 {
    const { position, box, hAlign, vAlign, fontSize } = this.options;
    if (!box) {
      return [position[0], position[1]];
    }
    return [
      position[0] + alignOffset(hAlign, box[0], contentWidth),
      position[1] + alignOffset(vAlign, box[1], fontSize),
    ];
  }

  /**
   * Shape, triangulate and lay out the span.
   *
   * @param color - Vertex color override; the compositor passes a palette index
   */
  generateTextMesh(context: LayoutContext, color: Color | number = this.options.color): TextMesh {
    const glyphs = this.shape(context);
    const { width } = this.measureGlyphs(context, glyphs);

    const builder = new TextMeshBuilder({
      unitsPerEm: this.options.face.unitsPerEm,
      fontSize: this.options.fontSize,
      textureSize: context.textureSize,
      origin: this.resolveOrigin(width),
      emCorrection: context.emCorrection,
      color,
    });

    const lookup = this.meshLookup(context);
    for (const glyph of glyphs) {
      builder.add(this.glyphMesh(lookup, glyph.glyphId), glyph);
    }
    return builder.build();
  }

  private measureGlyphs(context: LayoutContext, glyphs: readonly GlyphAdvance[]): SpanMeasurement {
    let advance = 0;
    for (const glyph of glyphs) {
      advance += glyph.xAdvance;
    }
    return {
      width: advance * this.scale(context),
      height: this.options.fontSize,
    };
  }

  private meshLookup(context: LayoutContext): (glyphId: number) => GlyphMesh | null {
    const { face } = this.options;
    const { cache } = context;
    if (cache) {
      return (glyphId) => cache.get(face, glyphId);
    }
    const meshBuilder = new GlyphMeshBuilder(face);
    return (glyphId) => meshBuilder.build(glyphId);
  }

  // Degenerate glyphs render as a gap at their advance
  private glyphMesh(
    lookup: (glyphId: number) => GlyphMesh | null,
    glyphId: number
  ): GlyphMesh | null {
    try {
      return lookup(glyphId);
    } catch (err) {
      if (err instanceof DegenerateGeometryError) {
        console.warn(`[Span] Skipping glyph ${glyphId} in "${this.options.text}": ${err.message}`);
        return null;
      }
      throw err;
    }
  }
}

/** Start a span with default styling */
export function createSpan(text: string, face: FontFace, style: Partial<SpanStyle> = {}): Span {
  return Span.create(text, face, style);
}

function alignOffset(align: Align, boxExtent: number, contentExtent: number): number {
  switch (align) {
    case "start":
      return 0;
    case "middle":
      return boxExtent / 2 - contentExtent / 2;
    case "end":
      return boxExtent - contentExtent;
  }
}
