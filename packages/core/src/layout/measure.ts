/**
 * packages/core/src/layout/measure.ts — Per-frame text collection and measurement.
 *
 * Every module hook called here is isolated: a throw is logged and only the
 * module concerned drops out of the current frame.
 */

import type { BarConfig } from "../config/types.js";
import { describeThrown } from "../errors.js";
import type { BarLogger } from "../logger.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { type BarModule, moduleIsVisible } from "../modules/types.js";
import type { Rasterizer } from "../render/surface.js";
import type { MeasuredItem, MeasuredSections } from "./sections.js";
import type { Section, TextMetrics } from "./types.js";

/** Text as drawn this frame, kept so drawing does not call displayText twice. */
export type FrameText = Readonly<{
  text: string;
  bold: boolean;
  metrics: TextMetrics;
}>;

export type MeasureResult = Readonly<{
  sections: MeasuredSections;
  texts: ReadonlyMap<string, FrameText>;
}>;

type MeasureContext = Readonly<{
  registry: ModuleRegistry;
  config: BarConfig;
  rasterizer: Rasterizer;
  logger: BarLogger;
  /** Modules whose update() threw this frame; they render as empty text. */
  failed: ReadonlySet<string>;
}>;

function callHook<T>(
  ctx: MeasureContext,
  module: BarModule,
  hook: string,
  fn: () => T,
  fallback: T,
): T {
  try {
    return fn();
  } catch (err: unknown) {
    ctx.logger.warn(
      { moduleId: module.id, hook, code: "STRIPBAR_MODULE_FAILURE", detail: describeThrown(err) },
      "module hook failed",
    );
    return fallback;
  }
}

function measure(ctx: MeasureContext, module: BarModule, text: string, bold: boolean): TextMetrics | null {
  try {
    return ctx.rasterizer.measureText(text, { bold });
  } catch (err: unknown) {
    ctx.logger.warn(
      { moduleId: module.id, code: "STRIPBAR_DRAW_FAILURE", detail: describeThrown(err) },
      "text measurement failed",
    );
    return null;
  }
}

function positiveWidth(raw: number | null | undefined): number | null {
  if (raw === null || raw === undefined || !Number.isFinite(raw) || raw <= 0) return null;
  return Math.ceil(raw);
}

function itemWidth(ctx: MeasureContext, module: BarModule, text: string, metrics: TextMetrics, bold: boolean): number {
  const padding = ctx.config.layout.itemPadding;

  const fixed = positiveWidth(ctx.config.fixedWidths[module.id]);
  if (fixed !== null) return fixed;

  const preferred = module.preferredWidth;
  if (preferred) {
    const w = positiveWidth(callHook(ctx, module, "preferredWidth", () => preferred.call(module), null));
    if (w !== null) return w;
  }

  const sampleHook = module.widthSample;
  if (sampleHook) {
    const sample = callHook(ctx, module, "widthSample", () => sampleHook.call(module, ctx.config), null);
    if (sample !== null && sample.length > 0) {
      const sampleMetrics = measure(ctx, module, sample, bold);
      // The sample is a floor: longer live text still gets its own width.
      if (sampleMetrics !== null) return Math.ceil(Math.max(sampleMetrics.w, metrics.w)) + 2 * padding;
    }
  }

  return text.length === 0 ? 0 : Math.ceil(metrics.w) + 2 * padding;
}

function measureOne(ctx: MeasureContext, module: BarModule, texts: Map<string, FrameText>): MeasuredItem | null {
  if (ctx.failed.has(module.id)) return null;

  if (!callHook(ctx, module, "isVisible", () => moduleIsVisible(module), false)) return null;

  const text = callHook(ctx, module, "displayText", () => module.displayText(ctx.config), "");
  if (text.length === 0) return null;

  const emphasized = module.emphasized;
  const bold = emphasized ? callHook(ctx, module, "emphasized", () => emphasized.call(module), false) : false;

  const metrics = measure(ctx, module, text, bold);
  if (metrics === null) return null;

  const w = itemWidth(ctx, module, text, metrics, bold);
  if (w <= 0) return null;

  const { barHeight, itemPadding } = ctx.config.layout;
  const h = Math.min(barHeight, Math.ceil(metrics.h) + itemPadding + 2);
  texts.set(module.id, Object.freeze({ text, bold, metrics }));
  return Object.freeze({ id: module.id, w, h });
}

/** Collect display text for every module of every section and size it. */
export function measureSections(ctx: MeasureContext): MeasureResult {
  const texts = new Map<string, FrameText>();
  const measureSection = (section: Section): readonly MeasuredItem[] => {
    const out: MeasuredItem[] = [];
    for (const module of ctx.registry.orderedModules(section)) {
      const item = measureOne(ctx, module, texts);
      if (item !== null) out.push(item);
    }
    return out;
  };
  const sections = Object.freeze({
    left: measureSection("left"),
    center: measureSection("center"),
    right: measureSection("right"),
  });
  return Object.freeze({ sections, texts });
}
