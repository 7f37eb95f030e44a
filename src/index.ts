/**
 * glyphmesh - Font outlines to triangle meshes, laid out and composited for
 * GPU rasterization
 */

export const VERSION = "0.1.0";

export * from "./types";
export * from "./errors";
export * from "./font";
export * from "./outline";
export * from "./mesh";
export * from "./text";
export * from "./compositor";
export * from "./render";
export * as geometry from "./geometry";
export type { Vec2 } from "./math/vec2";
