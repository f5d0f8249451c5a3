/**
 * packages/core/src/layout/layoutEngine.ts — Per-frame layout and render pass.
 *
 * Why: one call turns the registry and configuration into a BoundsMap and a
 * presented frame. The BoundsMap is published before drawing starts, so a
 * frame whose draw fails still leaves hit testing and drag commits working.
 *
 * Frame steps:
 *   1. registry.updateAll (failures isolated per module)
 *   2. measure every visible module with non-empty text
 *   3. pack Left, Right, Center and publish the BoundsMap
 *   4. acquire the back buffer, draw, present
 */

import type { BarConfig } from "../config/types.js";
import { StripbarError, describeThrown } from "../errors.js";
import type { BarLogger } from "../logger.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { BackBuffer } from "../render/backBuffer.js";
import { IDLE_VIEW, type InteractionView, drawFrame } from "../render/drawFrame.js";
import type { Rasterizer } from "../render/surface.js";
import type { BarTheme } from "../theme/types.js";
import { type FrameText, measureSections } from "./measure.js";
import { type PackedBar, packSections, toBoundsMap } from "./sections.js";
import type { BoundsMap, Size } from "./types.js";

export type FrameInput = Readonly<{
  registry: ModuleRegistry;
  config: BarConfig;
  size: Size;
  theme: BarTheme;
  view?: InteractionView;
}>;

export type FrameResult = Readonly<{
  seq: number;
  bounds: BoundsMap;
  /** False when the back buffer could not be allocated or presenting failed. */
  presented: boolean;
  /** Modules whose update() threw this frame. */
  failedModules: readonly string[];
  /** Ids that had text but did not fit the bar. */
  omitted: readonly string[];
}>;

export type LayoutPass = Readonly<{
  bounds: BoundsMap;
  packed: PackedBar;
  texts: ReadonlyMap<string, FrameText>;
}>;

const EMPTY_BOUNDS: BoundsMap = new Map();

export class LayoutEngine {
  private readonly rasterizer: Rasterizer;
  private readonly logger: BarLogger;
  private readonly backBuffer: BackBuffer;
  private current: BoundsMap = EMPTY_BOUNDS;
  private frameSeq = 0;
  private inFrame = false;
  private disposed = false;

  constructor(opts: Readonly<{ rasterizer: Rasterizer; logger: BarLogger }>) {
    this.rasterizer = opts.rasterizer;
    this.logger = opts.logger;
    this.backBuffer = new BackBuffer(opts);
  }

  /** BoundsMap of the most recently completed layout pass. */
  bounds(): BoundsMap {
    return this.current;
  }

  /** Measure and pack without updating modules or drawing. */
  layout(input: FrameInput, failed: ReadonlySet<string> = new Set()): LayoutPass {
    const { config, size } = input;
    const measured = measureSections({
      registry: input.registry,
      config,
      rasterizer: this.rasterizer,
      logger: this.logger,
      failed,
    });
    const packed = packSections(measured.sections, {
      barWidth: size.w,
      barHeight: size.h,
      margin: config.layout.margin,
      spacing: config.layout.itemSpacing,
    });
    return Object.freeze({ bounds: toBoundsMap(packed), packed, texts: measured.texts });
  }

  frame(input: FrameInput): FrameResult {
    if (this.disposed) throw new StripbarError("STRIPBAR_DISPOSED", "layout engine is disposed");
    if (this.inFrame) {
      throw new StripbarError("STRIPBAR_REENTRANT_CALL", "frame() called while a frame is in progress");
    }
    this.inFrame = true;
    try {
      return this.runFrame(input);
    } finally {
      this.inFrame = false;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.backBuffer.release();
    this.current = EMPTY_BOUNDS;
  }

  private runFrame(input: FrameInput): FrameResult {
    const seq = ++this.frameSeq;
    const failedModules = input.registry.updateAll(input.config);
    const pass = this.layout(input, new Set(failedModules));
    this.current = pass.bounds;

    const omitted = [...pass.packed.left.omitted, ...pass.packed.center.omitted, ...pass.packed.right.omitted];
    if (omitted.length > 0) this.logger.debug({ seq, omitted }, "modules omitted for lack of space");

    const presented = this.draw(input, pass);
    return Object.freeze({
      seq,
      bounds: pass.bounds,
      presented,
      failedModules,
      omitted: Object.freeze(omitted),
    });
  }

  private draw(input: FrameInput, pass: LayoutPass): boolean {
    const buffer = this.backBuffer.acquire(input.size);
    if (buffer === null) return false;

    const view = input.view ?? IDLE_VIEW;
    const drag = view.drag;
    try {
      drawFrame({
        buffer,
        bounds: pass.bounds,
        texts: pass.texts,
        theme: input.theme,
        view,
        dragSectionIds: drag === null ? [] : input.registry.sectionIds(drag.section),
        spacing: input.config.layout.itemSpacing,
        barHeight: input.size.h,
        logger: this.logger,
      });
      this.rasterizer.present(buffer);
      return true;
    } catch (err: unknown) {
      this.logger.warn({ code: "STRIPBAR_DRAW_FAILURE", detail: describeThrown(err) }, "frame draw failed");
      // The buffer may be in an unknown state; allocate a fresh one next frame.
      this.backBuffer.release();
      return false;
    }
  }
}
