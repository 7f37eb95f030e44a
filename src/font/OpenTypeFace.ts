/**
 * Font face backed by opentype.js.
 *
 * Outlines come back in font design units with y pointing up, matching the
 * coordinate system glyph meshes are built in.
 */

import { readFile } from "node:fs/promises";
import * as opentype from "opentype.js";
import type { Font, PathCommand } from "opentype.js";
import { InvalidFontDataError } from "../errors";
import type { GlyphOutline, OutlineCommand } from "../outline/types";
import type { FontFace } from "./types";

let nextFaceId = 0;

export class OpenTypeFace implements FontFace {
  readonly id: string;
  readonly font: Font;
  readonly unitsPerEm: number;
  readonly reverseWind: boolean;

  constructor(font: Font, id?: string) {
    this.font = font;
    this.id = id ?? `opentype-${nextFaceId++}`;
    this.unitsPerEm = font.unitsPerEm;
    // CFF contours wind opposite to TrueType ones
    this.reverseWind = font.outlinesFormat !== "truetype";
  }

  get glyphCount(): number {
    return this.font.glyphs.length;
  }

  outline(glyphId: number): GlyphOutline | null {
    if (!Number.isInteger(glyphId) || glyphId < 0 || glyphId >= this.glyphCount) {
      return null;
    }
    const glyph = this.font.glyphs.get(glyphId);
    // Scale 1 keeps design units; getPath flips y for screen space
    const path = glyph.getPath(0, 0, this.unitsPerEm);
    if (path.commands.length === 0) {
      return null;
    }

    const box = path.getBoundingBox();
    return {
      commands: path.commands.map(toOutlineCommand),
      bounds: {
        xMin: box.x1,
        yMin: flipY(box.y2),
        xMax: box.x2,
        yMax: flipY(box.y1),
      },
    };
  }
}

/**
 * Parse font bytes into a face.
 * @throws InvalidFontDataError when opentype.js rejects the data
 */
export function loadFontFace(bytes: ArrayBuffer | Uint8Array, id?: string): OpenTypeFace {
  const buffer =
    bytes instanceof Uint8Array
      ? bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength)
      : bytes;

  let font: Font;
  try {
    font = opentype.parse(buffer);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidFontDataError(`Invalid font data: ${reason}`, { cause: err });
  }
  if (!(font.unitsPerEm > 0)) {
    throw new InvalidFontDataError(`Invalid font data: unitsPerEm is ${font.unitsPerEm}`);
  }
  return new OpenTypeFace(font, id);
}

/** Read and parse a font file */
export async function loadFontFile(path: string): Promise<OpenTypeFace> {
  const bytes = await readFile(path);
  return loadFontFace(bytes, path);
}

// + 0 folds -0 into 0
function flipY(y: number): number {
  return -y + 0;
}

function toOutlineCommand(command: PathCommand): OutlineCommand {
  switch (command.type) {
    case "M":
    case "L":
      return { type: command.type, x: command.x, y: flipY(command.y) };
    case "Q":
      return {
        type: "Q",
        x1: command.x1,
        y1: flipY(command.y1),
        x: command.x,
        y: flipY(command.y),
      };
    case "C":
      return {
        type: "C",
        x1: command.x1,
        y1: flipY(command.y1),
        x2: command.x2,
        y2: flipY(command.y2),
        x: command.x,
        y: flipY(command.y),
      };
    case "Z":
      return { type: "Z" };
  }
}
