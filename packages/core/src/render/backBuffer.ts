/**
 * packages/core/src/render/backBuffer.ts — Off-screen buffer owned by the layout engine.
 *
 * Why: drawing always targets a buffer that is presented in one call, so the
 * visible surface never shows a half-drawn frame. The buffer is recreated
 * whenever the bar size changes. A failed allocation is reported once per
 * attempt and retried on the next frame.
 */

import { describeThrown } from "../errors.js";
import type { Size } from "../layout/types.js";
import type { BarLogger } from "../logger.js";
import type { OffscreenBuffer, Rasterizer } from "./surface.js";

export class BackBuffer {
  private buffer: OffscreenBuffer | null = null;
  private readonly rasterizer: Rasterizer;
  private readonly logger: BarLogger;

  constructor(opts: Readonly<{ rasterizer: Rasterizer; logger: BarLogger }>) {
    this.rasterizer = opts.rasterizer;
    this.logger = opts.logger;
  }

  /** The buffer for `size`, or null when it could not be allocated this frame. */
  acquire(size: Size): OffscreenBuffer | null {
    const current = this.buffer;
    if (current !== null && current.size.w === size.w && current.size.h === size.h) {
      return current;
    }
    this.release();
    if (size.w <= 0 || size.h <= 0) return null;
    try {
      this.buffer = this.rasterizer.createBuffer(size);
    } catch (err: unknown) {
      this.logger.warn(
        { code: "STRIPBAR_DRAW_FAILURE", w: size.w, h: size.h, detail: describeThrown(err) },
        "back buffer allocation failed; frame not drawn",
      );
      return null;
    }
    return this.buffer;
  }

  get allocated(): boolean {
    return this.buffer !== null;
  }

  release(): void {
    const prev = this.buffer;
    this.buffer = null;
    if (prev === null) return;
    try {
      prev.dispose();
    } catch (err: unknown) {
      this.logger.debug({ detail: describeThrown(err) }, "back buffer dispose failed");
    }
  }
}
