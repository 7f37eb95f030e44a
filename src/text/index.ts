/**
 * Text layout
 */

export {
  Span,
  createSpan,
  DEFAULT_SPAN_STYLE,
  type Align,
  type SpanOptions,
  type SpanStyle,
  type LayoutContext,
  type SpanMeasurement,
} from "./Span";
export { TextMeshBuilder, type TextMeshBuilderOptions } from "./TextMeshBuilder";
export { EM_CORRECTION, POINTS_TO_PIXELS, pointsToPixels } from "./constants";
