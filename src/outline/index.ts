/**
 * Outline collection
 */

export * from "./types";
export { OutlineCollector, collectOutline } from "./OutlineCollector";
