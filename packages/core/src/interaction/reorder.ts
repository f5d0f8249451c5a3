/**
 * packages/core/src/interaction/reorder.ts — Drop position math for drag reorder.
 *
 * Positions are computed against the BoundsMap of the last layout pass. The
 * dragged module keeps its slot while dragging, so it is part of the visual
 * order; removing it is accounted for when mapping back to list indices.
 */

import { midpointX, rectRight } from "../layout/rect.js";
import type { BoundsMap } from "../layout/types.js";

export type ReorderPlan = Readonly<{
  oldIndex: number;
  newIndex: number;
  order: readonly string[];
}>;

/** Ids of a section list that have bounds, left to right on screen. */
export function visualOrder(bounds: BoundsMap, sectionIds: readonly string[]): readonly string[] {
  const placed = sectionIds.filter((id) => bounds.has(id));
  return placed.sort((a, b) => (bounds.get(a)?.x ?? 0) - (bounds.get(b)?.x ?? 0));
}

/**
 * Index into `visual` of the first module whose midpoint is strictly right of
 * `releaseX`; `visual.length` when there is none.
 */
export function computeInsertionIndex(
  bounds: BoundsMap,
  visual: readonly string[],
  releaseX: number,
): number {
  for (let i = 0; i < visual.length; i++) {
    const id = visual[i];
    const rect = id === undefined ? undefined : bounds.get(id);
    if (rect !== undefined && midpointX(rect) > releaseX) return i;
  }
  return visual.length;
}

/**
 * Turn a visual insertion index into a list move.
 *
 * Returns null when the drop leaves the order unchanged, including drops
 * directly before or after the dragged module itself.
 */
export function planReorder(
  sectionIds: readonly string[],
  visual: readonly string[],
  moduleId: string,
  insertionIndex: number,
): ReorderPlan | null {
  const oldIndex = sectionIds.indexOf(moduleId);
  if (oldIndex < 0) return null;

  let newIndex: number;
  if (insertionIndex < visual.length) {
    const target = visual[insertionIndex];
    if (target === undefined || target === moduleId) return null;
    const targetIndex = sectionIds.indexOf(target);
    if (targetIndex < 0) return null;
    newIndex = targetIndex > oldIndex ? targetIndex - 1 : targetIndex;
  } else {
    const last = visual[visual.length - 1];
    if (last === undefined || last === moduleId) return null;
    const lastIndex = sectionIds.indexOf(last);
    if (lastIndex < 0) return null;
    newIndex = lastIndex > oldIndex ? lastIndex : lastIndex + 1;
  }

  if (newIndex === oldIndex) return null;
  const order = [...sectionIds];
  order.splice(oldIndex, 1);
  order.splice(newIndex, 0, moduleId);
  return Object.freeze({ oldIndex, newIndex, order: Object.freeze(order) });
}

/** X position of the insertion caret drawn between two modules. */
export function insertionCaretX(
  bounds: BoundsMap,
  visual: readonly string[],
  insertionIndex: number,
  spacing: number,
): number | null {
  const half = Math.floor(spacing / 2);
  const target = visual[insertionIndex];
  const targetRect = target === undefined ? undefined : bounds.get(target);
  if (targetRect !== undefined) return targetRect.x - half;
  const last = visual[visual.length - 1];
  const lastRect = last === undefined ? undefined : bounds.get(last);
  if (lastRect !== undefined) return rectRight(lastRect) + half;
  return null;
}
