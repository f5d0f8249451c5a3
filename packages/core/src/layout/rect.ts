import type { Rect } from "./types.js";

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function contains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
}

export function rectRight(rect: Rect): number {
  return rect.x + rect.w;
}

/** Horizontal midpoint. Not rounded: odd widths land on a half pixel. */
export function midpointX(rect: Rect): number {
  return rect.x + rect.w / 2;
}

export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
  return intersectRect(a, b) !== null;
}

/**
 * Vertically center a box of height `h` inside a strip of height `stripH`.
 * Boxes taller than the strip are clamped to it.
 */
export function centerVertically(x: number, w: number, h: number, stripH: number): Rect {
  const height = Math.max(0, Math.min(stripH, h));
  const y = Math.floor((stripH - height) / 2);
  return Object.freeze({ x, y, w, h: height });
}
