/**
 * Font faces and shaping
 */

export type { FontFace, Shaper } from "./types";
export { OpenTypeFace, loadFontFace, loadFontFile } from "./OpenTypeFace";
export { OpenTypeShaper, type OpenTypeShaperOptions } from "./OpenTypeShaper";
