/**
 * packages/core/src/layout/sections.ts — Horizontal packing of the three sections.
 *
 * Pure functions over measured items. Packing rules:
 *   - Left:   list order, from the left margin rightwards.
 *   - Right:  reverse list order, from the right margin leftwards.
 *   - Center: total width first, then centered on the bar and placed left to right.
 *
 * Space is granted in the order Left, Right, Center. Each section is clamped
 * to the space the previous ones left free, so sections never overlap and no
 * rectangle extends past the bar. An item that does not fit is omitted
 * together with every item after it in its packing direction.
 */

import { centerVertically } from "./rect.js";
import type { Rect, Section } from "./types.js";

/** A module ready for packing: outer width (padding included) and box height. */
export type MeasuredItem = Readonly<{ id: string; w: number; h: number }>;

export type PackOptions = Readonly<{
  barWidth: number;
  barHeight: number;
  margin: number;
  spacing: number;
}>;

export type PlacedItem = Readonly<{ id: string; rect: Rect }>;

export type PackedSection = Readonly<{
  section: Section;
  /** Placed items, left to right on screen. */
  placed: readonly PlacedItem[];
  /** Ids that did not fit this frame. */
  omitted: readonly string[];
}>;

export type PackedBar = Readonly<{
  left: PackedSection;
  center: PackedSection;
  right: PackedSection;
}>;

export type MeasuredSections = Readonly<{
  left: readonly MeasuredItem[];
  center: readonly MeasuredItem[];
  right: readonly MeasuredItem[];
}>;

function place(item: MeasuredItem, x: number, barHeight: number): PlacedItem {
  return Object.freeze({ id: item.id, rect: centerVertically(x, item.w, item.h, barHeight) });
}

/** Pack left-to-right starting at `opts.margin`, never passing `limitRight`. */
export function packLeft(
  items: readonly MeasuredItem[],
  opts: PackOptions,
  limitRight: number,
): PackedSection {
  const placed: PlacedItem[] = [];
  const omitted: string[] = [];
  let x = opts.margin;
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!item) continue;
    if (omitted.length > 0 || x + item.w > limitRight) {
      omitted.push(item.id);
      continue;
    }
    placed.push(place(item, x, opts.barHeight));
    x += item.w + opts.spacing;
  }
  return Object.freeze({ section: "left", placed: Object.freeze(placed), omitted: Object.freeze(omitted) });
}

/**
 * Pack in reverse list order starting at `barWidth - margin`, never passing
 * `limitLeft`. The last list entry ends up right-most.
 */
export function packRight(
  items: readonly MeasuredItem[],
  opts: PackOptions,
  limitLeft: number,
): PackedSection {
  const placedReversed: PlacedItem[] = [];
  const omitted: string[] = [];
  let x = opts.barWidth - opts.margin;
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (!item) continue;
    if (omitted.length > 0 || x - item.w < limitLeft) {
      omitted.push(item.id);
      continue;
    }
    x -= item.w;
    placedReversed.push(place(item, x, opts.barHeight));
    x -= opts.spacing;
  }
  return Object.freeze({
    section: "right",
    placed: Object.freeze(placedReversed.reverse()),
    omitted: Object.freeze(omitted.reverse()),
  });
}

function totalWidth(items: readonly MeasuredItem[], spacing: number): number {
  if (items.length === 0) return 0;
  let total = 0;
  for (const item of items) total += item.w;
  return total + spacing * (items.length - 1);
}

/**
 * Center the whole group on the bar, clamped into [minX, maxX]. Trailing
 * items are dropped until the group fits.
 */
export function packCenter(
  items: readonly MeasuredItem[],
  opts: PackOptions,
  minX: number,
  maxX: number,
): PackedSection {
  const kept = [...items];
  const omitted: string[] = [];
  const available = Math.max(0, maxX - minX);
  while (kept.length > 0 && totalWidth(kept, opts.spacing) > available) {
    const dropped = kept.pop();
    if (dropped) omitted.unshift(dropped.id);
  }

  const total = totalWidth(kept, opts.spacing);
  const placed: PlacedItem[] = [];
  if (kept.length > 0) {
    const centered = Math.floor((opts.barWidth - total) / 2);
    let x = Math.min(Math.max(centered, minX), maxX - total);
    for (const item of kept) {
      placed.push(place(item, x, opts.barHeight));
      x += item.w + opts.spacing;
    }
  }
  return Object.freeze({
    section: "center",
    placed: Object.freeze(placed),
    omitted: Object.freeze(omitted),
  });
}

/** Pack all sections: Left first, then Right up to Left's end, then Center in between. */
export function packSections(measured: MeasuredSections, opts: PackOptions): PackedBar {
  const innerRight = opts.barWidth - opts.margin;
  const left = packLeft(measured.left, opts, innerRight);

  const lastLeft = left.placed[left.placed.length - 1];
  const leftEnd = lastLeft ? lastLeft.rect.x + lastLeft.rect.w + opts.spacing : opts.margin;
  const right = packRight(measured.right, opts, leftEnd);

  const firstRight = right.placed[0];
  const rightStart = firstRight ? firstRight.rect.x - opts.spacing : innerRight;
  const center = packCenter(measured.center, opts, leftEnd, rightStart);

  return Object.freeze({ left, center, right });
}

/** Flatten a packed bar into a BoundsMap (left, center, right; each left to right). */
export function toBoundsMap(packed: PackedBar): Map<string, Rect> {
  const bounds = new Map<string, Rect>();
  for (const section of [packed.left, packed.center, packed.right]) {
    for (const item of section.placed) bounds.set(item.id, item.rect);
  }
  return bounds;
}
