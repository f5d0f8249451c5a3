/**
 * packages/core/src/runtime/barRuntime.ts — Serial event loop integration.
 *
 * Why: layout, hit testing, drawing and drag state are owned by one loop.
 * Every host event goes through dispatch(), which appends to a FIFO queue and
 * drains it unless a drain is already running, so an event posted from inside
 * a handler is processed after the current one, never nested in it.
 *
 * Frames are pulled, not pushed: handlers only mark the bar dirty. When a
 * drain leaves the bar dirty the runtime asks the host for a paint once;
 * the host answers with a `paint` event. Without a requestPaint callback the
 * frame runs at the end of the drain.
 */

import type { BarConfig } from "../config/types.js";
import { StripbarError, describeThrown } from "../errors.js";
import type { BarEvent, ModuleCommand, ReorderCommit } from "../events.js";
import { InteractionController } from "../interaction/controller.js";
import type { InteractionPhase } from "../interaction/dragState.js";
import { type FrameResult, LayoutEngine } from "../layout/layoutEngine.js";
import type { BoundsMap, Size } from "../layout/types.js";
import type { BarLogger } from "../logger.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { moduleTooltip } from "../modules/types.js";
import type { Rasterizer } from "../render/surface.js";
import { resolveTheme } from "../theme/theme.js";
import type { BarTheme } from "../theme/types.js";
import { type AsyncBridge, createAsyncBridge } from "./asyncBridge.js";
import type { BarContext } from "./context.js";

export type BarRuntimeOptions = Readonly<{
  registry: ModuleRegistry;
  rasterizer: Rasterizer;
  logger: BarLogger;
  config: BarConfig;
  /** Bar width in pixels; height defaults to config.layout.barHeight. */
  width: number;
  height?: number;
  bridge?: AsyncBridge;
  onReorderCommit?: (commit: ReorderCommit) => void;
  onCommand?: (command: ModuleCommand) => void;
  /** Ask the host to deliver a `paint` event soon. */
  requestPaint?: () => void;
  onFrame?: (frame: FrameResult) => void;
}>;

function requireDimension(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) {
    throw new StripbarError("STRIPBAR_INVALID_EVENT", `${name} must be a positive integer (got ${String(v)})`);
  }
  return v;
}

function validateEvent(ev: BarEvent): void {
  switch (ev.kind) {
    case "pointerDown":
    case "pointerMove":
    case "pointerUp":
    case "scroll":
      if (!Number.isFinite(ev.x) || !Number.isFinite(ev.y)) {
        throw new StripbarError("STRIPBAR_INVALID_EVENT", `${ev.kind}: coordinates must be finite numbers`);
      }
      if (ev.kind === "scroll" && !Number.isFinite(ev.delta)) {
        throw new StripbarError("STRIPBAR_INVALID_EVENT", "scroll: delta must be a finite number");
      }
      return;
    case "resize":
      requireDimension("resize.w", ev.w);
      requireDimension("resize.h", ev.h);
      return;
    default:
      return;
  }
}

export class BarRuntime {
  readonly context: BarContext;

  private readonly engine: LayoutEngine;
  private readonly controller: InteractionController;
  private readonly bridge: AsyncBridge;
  private readonly logger: BarLogger;
  private readonly registry: ModuleRegistry;
  private readonly opts: BarRuntimeOptions;

  private config: BarConfig;
  private theme: BarTheme;
  private size: Size;
  private readonly queue: BarEvent[] = [];
  private draining = false;
  private dirty = true;
  private paintRequested = false;
  private disposed = false;
  private lastFrame: FrameResult | null = null;

  constructor(opts: BarRuntimeOptions) {
    this.opts = opts;
    this.logger = opts.logger;
    this.registry = opts.registry;
    this.config = opts.config;
    this.theme = resolveTheme(opts.config.theme, opts.config.accentColor);
    this.size = Object.freeze({
      w: requireDimension("width", opts.width),
      h: requireDimension("height", opts.height ?? opts.config.layout.barHeight),
    });
    this.bridge = opts.bridge ?? createAsyncBridge();
    this.engine = new LayoutEngine({ rasterizer: opts.rasterizer, logger: opts.logger });

    this.context = Object.freeze({
      registry: opts.registry,
      rasterizer: opts.rasterizer,
      logger: opts.logger,
      bridge: this.bridge,
      config: () => this.config,
      size: () => this.size,
      bounds: () => this.engine.bounds(),
    });

    this.controller = new InteractionController({
      registry: opts.registry,
      logger: opts.logger,
      bounds: () => this.engine.bounds(),
      config: () => this.config,
      requestRedraw: () => {
        this.dirty = true;
      },
      emitReorder: (commit) => this.emitReorder(commit),
      requestCommand: (command) => this.emitCommand(command),
    });

    this.registry.applyConfig(this.config);
    this.bridge.setWakeup(() => this.pumpBridge());
  }

  /** Append an event to the serial queue and drain it unless already draining. */
  dispatch(ev: BarEvent): void {
    this.post([ev]);
  }

  private post(events: readonly BarEvent[]): void {
    this.assertLive();
    for (const ev of events) validateEvent(ev);
    this.queue.push(...events);
    if (this.draining) return;

    this.draining = true;
    try {
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        this.handle(next);
      }
    } finally {
      this.draining = false;
    }
    this.afterDrain();
  }

  /** Run a frame now, regardless of the dirty flag. */
  frame(): FrameResult {
    this.assertLive();
    this.paintRequested = false;
    this.dirty = false;
    this.controller.validate();
    const result = this.engine.frame({
      registry: this.registry,
      config: this.config,
      size: this.size,
      theme: this.theme,
      view: {
        hoverId: this.controller.hoverId,
        pressedId: this.controller.pressedId,
        drag: this.controller.dragPreview(),
      },
    });
    this.lastFrame = result;
    this.opts.onFrame?.(result);
    return result;
  }

  /** Mark the bar dirty and request a paint. */
  invalidate(): void {
    this.assertLive();
    this.dirty = true;
    if (!this.draining) this.afterDrain();
  }

  bounds(): BoundsMap {
    return this.engine.bounds();
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get phase(): InteractionPhase {
    return this.controller.phase;
  }

  get hoverId(): string | null {
    return this.controller.hoverId;
  }

  get currentConfig(): BarConfig {
    return this.config;
  }

  get lastFrameResult(): FrameResult | null {
    return this.lastFrame;
  }

  /** Tooltip of the hovered module, or null. */
  tooltip(): string | null {
    const id = this.controller.hoverId;
    if (id === null) return null;
    const module = this.registry.get(id);
    if (module === null) return null;
    try {
      return moduleTooltip(module);
    } catch (err: unknown) {
      this.logger.warn(
        { moduleId: id, code: "STRIPBAR_MODULE_FAILURE", detail: describeThrown(err) },
        "module tooltip failed",
      );
      return null;
    }
  }

  /** Stop accepting events and release drawing resources. Modules are owned by the caller. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.bridge.setWakeup(null);
    this.queue.length = 0;
    this.engine.dispose();
  }

  private handle(ev: BarEvent): void {
    switch (ev.kind) {
      case "pointerDown":
        this.controller.pointerDown(ev.x, ev.y, ev.button);
        return;
      case "pointerMove":
        this.controller.pointerMove(ev.x, ev.y);
        return;
      case "pointerUp":
        this.controller.pointerUp(ev.x, ev.y, ev.button);
        return;
      case "pointerLeave":
        this.controller.pointerLeave();
        return;
      case "captureLost":
        this.controller.captureLost();
        return;
      case "scroll":
        this.controller.scroll(ev.x, ev.y, ev.delta);
        return;
      case "paint":
        this.frame();
        return;
      case "resize":
        this.size = Object.freeze({ w: ev.w, h: ev.h });
        this.dirty = true;
        return;
      case "timerTick":
        this.dirty = true;
        return;
      case "refresh":
        this.logger.trace({ moduleId: ev.moduleId }, "refresh requested");
        this.dirty = true;
        return;
      case "configChanged":
        this.applyConfig(ev.config);
        return;
    }
  }

  private applyConfig(config: BarConfig): void {
    this.config = config;
    this.theme = resolveTheme(config.theme, config.accentColor);
    this.registry.applyConfig(config);
    this.controller.validate();
    this.dirty = true;
  }

  private afterDrain(): void {
    if (!this.dirty || this.paintRequested || this.disposed) return;
    const requestPaint = this.opts.requestPaint;
    if (requestPaint === undefined) {
      this.frame();
      return;
    }
    this.paintRequested = true;
    requestPaint();
  }

  private pumpBridge(): void {
    if (this.disposed) return;
    const events = this.bridge.drain().map((moduleId): BarEvent => ({ kind: "refresh", moduleId }));
    if (events.length > 0) this.post(events);
  }

  private emitReorder(commit: ReorderCommit): void {
    this.logger.info(
      { section: commit.section, moduleId: commit.moduleId, oldIndex: commit.oldIndex, newIndex: commit.newIndex },
      "module reordered",
    );
    const listener = this.opts.onReorderCommit;
    if (listener === undefined) return;
    try {
      listener(commit);
    } catch (err: unknown) {
      this.logger.error({ detail: describeThrown(err) }, "reorder listener failed");
    }
  }

  private emitCommand(command: ModuleCommand): void {
    const listener = this.opts.onCommand;
    if (listener === undefined) {
      this.logger.debug({ command: command.kind }, "module command ignored; no handler installed");
      return;
    }
    try {
      listener(command);
    } catch (err: unknown) {
      this.logger.error({ command: command.kind, detail: describeThrown(err) }, "command handler failed");
    }
  }

  private assertLive(): void {
    if (this.disposed) throw new StripbarError("STRIPBAR_DISPOSED", "bar runtime is disposed");
  }
}
