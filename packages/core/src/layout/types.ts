/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * All coordinates are integer pixels relative to the bar's top-left corner.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in pixels. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in pixels. */
export type Size = Readonly<{ w: number; h: number }>;

export type Point = Readonly<{ x: number; y: number }>;

/** Placement zone of the bar. Center is laid out but never reorderable. */
export type Section = "left" | "center" | "right";

export const SECTIONS: readonly Section[] = Object.freeze(["left", "center", "right"]);

/**
 * Per-frame mapping from module id to its on-screen rectangle.
 *
 * Replaced wholesale by every layout pass and valid only until the next one.
 */
export type BoundsMap = ReadonlyMap<string, Rect>;

/** Metrics returned by the rasterizer for a single line of text. */
export type TextMetrics = Readonly<{ w: number; h: number }>;

export const EMPTY_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });
