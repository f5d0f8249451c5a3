/**
 * packages/core/src/render/drawFrame.ts — Paint one laid-out frame into a buffer.
 *
 * Draw order: background, module slots (hover/pressed/ghost fill and text),
 * then the drag overlay (floating preview and insertion caret).
 */

import { describeThrown } from "../errors.js";
import { computeInsertionIndex, insertionCaretX, visualOrder } from "../interaction/reorder.js";
import type { DragPreview } from "../interaction/dragState.js";
import type { FrameText } from "../layout/measure.js";
import type { BoundsMap, Rect } from "../layout/types.js";
import type { BarLogger } from "../logger.js";
import type { BarTheme } from "../theme/types.js";
import type { OffscreenBuffer } from "./surface.js";

export type InteractionView = Readonly<{
  hoverId: string | null;
  pressedId: string | null;
  drag: DragPreview | null;
}>;

export const IDLE_VIEW: InteractionView = Object.freeze({ hoverId: null, pressedId: null, drag: null });

export type DrawFrameInput = Readonly<{
  buffer: OffscreenBuffer;
  bounds: BoundsMap;
  texts: ReadonlyMap<string, FrameText>;
  theme: BarTheme;
  view: InteractionView;
  /** Id list of the section being dragged in (for the caret). */
  dragSectionIds: readonly string[];
  spacing: number;
  barHeight: number;
  logger: BarLogger;
}>;

const CARET_THICKNESS = 2;
const CARET_INSET = 6;

function drawLabel(
  buffer: OffscreenBuffer,
  rect: Rect,
  text: FrameText,
  fg: number,
  dim: boolean,
  barHeight: number,
): void {
  const textX = rect.x + Math.floor((rect.w - text.metrics.w) / 2);
  const textY = Math.floor((barHeight - text.metrics.h) / 2);
  buffer.drawText(textX, textY, text.text, { fg, bold: text.bold, dim });
}

function slotFill(theme: BarTheme, view: InteractionView, id: string): number | null {
  if (view.drag !== null && view.drag.moduleId === id) return theme.backgroundSecondary;
  if (view.pressedId === id) return theme.pressed;
  if (view.hoverId === id) return theme.hover;
  return null;
}

function drawSlots(input: DrawFrameInput): void {
  const { buffer, theme, view } = input;
  for (const [id, rect] of input.bounds) {
    const text = input.texts.get(id);
    if (text === undefined) continue;
    try {
      const fill = slotFill(theme, view, id);
      if (fill !== null) buffer.fillRect(rect, fill);
      const ghost = view.drag !== null && view.drag.moduleId === id;
      drawLabel(buffer, rect, text, ghost ? theme.textSecondary : theme.textPrimary, ghost, input.barHeight);
    } catch (err: unknown) {
      input.logger.warn(
        { moduleId: id, code: "STRIPBAR_DRAW_FAILURE", detail: describeThrown(err) },
        "module draw failed",
      );
    }
  }
}

function drawDragOverlay(input: DrawFrameInput, drag: DragPreview): void {
  const { buffer, bounds, theme } = input;
  const rect = bounds.get(drag.moduleId);
  const text = input.texts.get(drag.moduleId);
  if (rect === undefined || text === undefined) return;

  const maxX = Math.max(0, buffer.size.w - rect.w);
  const floatX = Math.min(maxX, Math.max(0, drag.currentX - Math.floor(rect.w / 2)));
  const floating: Rect = { x: floatX, y: rect.y, w: rect.w, h: rect.h };
  buffer.fillRect(floating, theme.hover);
  drawLabel(buffer, floating, text, theme.textPrimary, false, input.barHeight);

  const visual = visualOrder(bounds, input.dragSectionIds);
  const index = computeInsertionIndex(bounds, visual, drag.currentX);
  const caretX = insertionCaretX(bounds, visual, index, input.spacing);
  if (caretX === null) return;
  const bottom = Math.max(CARET_INSET, input.barHeight - CARET_INSET);
  buffer.drawLine(caretX, CARET_INSET, caretX, bottom, theme.accent, CARET_THICKNESS);
}

export function drawFrame(input: DrawFrameInput): void {
  input.buffer.clear(input.theme.background);
  drawSlots(input);
  const drag = input.view.drag;
  if (drag === null) return;
  try {
    drawDragOverlay(input, drag);
  } catch (err: unknown) {
    input.logger.warn(
      { moduleId: drag.moduleId, code: "STRIPBAR_DRAW_FAILURE", detail: describeThrown(err) },
      "drag overlay draw failed",
    );
  }
}
