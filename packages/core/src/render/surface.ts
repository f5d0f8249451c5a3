/**
 * packages/core/src/render/surface.ts — Drawing capability consumed by the core.
 *
 * The core depends only on these capabilities. A rasterizer measures text,
 * hands out off-screen buffers and presents a finished buffer to the visible
 * surface in one step, so a partially drawn frame is never shown.
 */

import type { Rect, Size, TextMetrics } from "../layout/types.js";
import type { Rgb24, TextStyle } from "./style.js";

export interface OffscreenBuffer {
  readonly size: Size;
  clear(color: Rgb24): void;
  fillRect(rect: Rect, color: Rgb24): void;
  drawText(x: number, y: number, text: string, style: TextStyle): void;
  drawLine(x0: number, y0: number, x1: number, y1: number, color: Rgb24, thickness: number): void;
  drawIcon(x: number, y: number, icon: string, size: number): void;
  /** Release backing storage. The buffer is not used afterwards. */
  dispose(): void;
}

export interface Rasterizer {
  measureText(text: string, style?: Readonly<{ bold?: boolean | undefined }>): TextMetrics;
  /** May throw when the backing storage cannot be allocated. */
  createBuffer(size: Size): OffscreenBuffer;
  /** Copy a finished buffer to the visible surface atomically. */
  present(buffer: OffscreenBuffer): void;
}
