/**
 * packages/core/src/layout/hitTest.ts — Pointer hit testing against the BoundsMap.
 *
 * Sections never overlap, so the first containing rectangle is the only one.
 * Bounds are single-buffered: a hit test observes the most recently completed
 * layout pass, which lags pointer input by at most one frame.
 */

import { contains } from "./rect.js";
import type { BoundsMap, Rect } from "./types.js";

export { contains } from "./rect.js";

/** Id of the module whose rectangle contains (x,y), or null. */
export function hitTest(bounds: BoundsMap, x: number, y: number): string | null {
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  for (const [id, rect] of bounds) {
    if (contains(rect, x, y)) return id;
  }
  return null;
}

export type HitResult = Readonly<{ id: string; rect: Rect }>;

/** Like hitTest, but also returns the rectangle (for menu anchoring). */
export function hitTestWithRect(bounds: BoundsMap, x: number, y: number): HitResult | null {
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  for (const [id, rect] of bounds) {
    if (contains(rect, x, y)) return Object.freeze({ id, rect });
  }
  return null;
}
