/**
 * Geometry utilities
 */

export * from "./types";
export { tessellatePolygon, groupRings } from "./tessellate";
export {
  signedArea,
  isCounterClockwise,
  classifyRing,
  isConcaveCurve,
} from "./winding";
