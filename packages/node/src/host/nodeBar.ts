/**
 * packages/node/src/host/nodeBar.ts — Node host for the bar runtime.
 *
 * Why: the core owns no timers and no I/O. This host wires the pieces a
 * running bar needs around a BarRuntime:
 *   - configuration store (defaults ← code ← STRIPBAR_* env), reorder commits
 *     written back into it and every new snapshot posted as configChanged
 *   - paint requests coalesced into one `paint` event per turn (setImmediate)
 *   - slow and fast timer ticks planned by computeTimerPlan
 *   - the async bridge waking the loop from background tasks
 *   - module commands (URLs, programs, menus)
 */

import {
  type AsyncBridge,
  type BarConfig,
  type BarConfigInput,
  type BarEvent,
  type BarLogger,
  BarRuntime,
  type ConfigStore,
  type FrameResult,
  type ModuleCommand,
  type ModuleRegistry,
  type Rasterizer,
  type ReorderCommit,
  createAsyncBridge,
  createConfigStore,
  resolveBarConfig,
  resolveSectionOrder,
} from "@stripbar/core";
import { TextGridRasterizer } from "../backend/textGridRasterizer.js";
import { readEnvConfig } from "../config/env.js";
import { createLogger } from "../logger.js";
import { type ModuleMenu, applyMenuSelection, buildModuleMenu, runMenuAction } from "../menus/moduleMenus.js";
import { type DefaultModuleSources, createDefaultRegistry } from "../modules/defaultRegistry.js";
import { createCommandRunner } from "./commands.js";
import { type TimerPlan, computeAlignedDelay, computeTimerPlan } from "./timerPlan.js";

export type NodeBarOptions = Readonly<{
  /** Bar width in pixels. */
  width: number;
  height?: number;
  config?: BarConfigInput;
  env?: NodeJS.ProcessEnv;
  logger?: BarLogger;
  rasterizer?: Rasterizer;
  /** Build the registry; defaults to every built-in module. */
  createRegistry?: (deps: Readonly<{ bridge: AsyncBridge; logger: BarLogger }>) => ModuleRegistry;
  sources?: DefaultModuleSources;
  onCommand?: (command: ModuleCommand) => void;
  onFrame?: (frame: FrameResult) => void;
  timers?: Readonly<{ slowIntervalMs?: number; fastIntervalMs?: number; enabled?: boolean }>;
  wallClock?: () => number;
}>;

export interface NodeBar {
  readonly runtime: BarRuntime;
  readonly store: ConfigStore;
  readonly registry: ModuleRegistry;
  readonly logger: BarLogger;
  readonly timerPlan: TimerPlan;
  dispatch(ev: BarEvent): void;
  menuFor(moduleId: string): ModuleMenu | null;
  /** Run a menu action or apply a menu choice to the configuration. False when the item is not offered. */
  selectMenuItem(moduleId: string, itemId: string): boolean;
  /** Clear timers, dispose the runtime and every module. Idempotent. */
  stop(): void;
}

function planFor(config: BarConfig, timers: NodeBarOptions["timers"]): TimerPlan {
  const order = resolveSectionOrder(config).order;
  const placed = [...order.left, ...order.center, ...order.right];
  return computeTimerPlan({
    slowIntervalMs: timers?.slowIntervalMs,
    fastIntervalMs: timers?.fastIntervalMs,
    needsFastTick: placed.includes("active_app"),
    hasClock: placed.includes("clock"),
  });
}

function samePlan(a: TimerPlan, b: TimerPlan): boolean {
  return a.slowIntervalMs === b.slowIntervalMs && a.fastIntervalMs === b.fastIntervalMs && a.alignSlowTick === b.alignSlowTick;
}

export function createNodeBar(opts: NodeBarOptions): NodeBar {
  const env = opts.env ?? process.env;
  const logger = opts.logger ?? createLogger({ env });
  const wallClock = opts.wallClock ?? Date.now;
  const initial = resolveBarConfig(readEnvConfig(env), resolveBarConfig(opts.config));
  const store = createConfigStore(initial);
  const bridge = createAsyncBridge({ schedule: (fn) => setImmediate(fn) });
  const registry = opts.createRegistry
    ? opts.createRegistry({ bridge, logger })
    : createDefaultRegistry({ bridge, logger, sources: opts.sources });
  const rasterizer = opts.rasterizer ?? new TextGridRasterizer();
  const runCommand = opts.onCommand ?? createCommandRunner({ logger });

  let stopped = false;
  let paintHandle: NodeJS.Immediate | null = null;
  let slowTimer: NodeJS.Timeout | null = null;
  let fastTimer: NodeJS.Timeout | null = null;
  let plan = planFor(initial, opts.timers);

  const onReorderCommit = (commit: ReorderCommit): void => {
    if (!store.applyReorder(commit)) {
      logger.warn({ section: commit.section, moduleId: commit.moduleId }, "stale reorder commit ignored");
    }
  };

  const runtime = new BarRuntime({
    registry,
    rasterizer,
    logger,
    config: initial,
    width: opts.width,
    height: opts.height,
    bridge,
    onReorderCommit,
    onCommand: runCommand,
    onFrame: opts.onFrame,
    requestPaint: () => {
      if (stopped || paintHandle !== null) return;
      paintHandle = setImmediate(() => {
        paintHandle = null;
        if (!stopped) runtime.dispatch({ kind: "paint" });
      });
    },
  });

  const tick = (timerId: string): void => {
    if (!stopped) runtime.dispatch({ kind: "timerTick", timerId });
  };

  const scheduleSlow = (): void => {
    const delay = plan.alignSlowTick ? computeAlignedDelay(wallClock(), plan.slowIntervalMs) : plan.slowIntervalMs;
    slowTimer = setTimeout(() => {
      tick("slow");
      if (!stopped) scheduleSlow();
    }, delay);
  };

  const clearTimers = (): void => {
    if (slowTimer !== null) clearTimeout(slowTimer);
    if (fastTimer !== null) clearInterval(fastTimer);
    slowTimer = null;
    fastTimer = null;
  };

  const startTimers = (): void => {
    if (opts.timers?.enabled === false) return;
    clearTimers();
    scheduleSlow();
    if (plan.fastIntervalMs !== null) fastTimer = setInterval(() => tick("fast"), plan.fastIntervalMs);
    logger.debug({ slowIntervalMs: plan.slowIntervalMs, fastIntervalMs: plan.fastIntervalMs }, "timers started");
  };

  const unsubscribe = store.subscribe((next) => {
    if (stopped) return;
    runtime.dispatch({ kind: "configChanged", config: next });
    const nextPlan = planFor(next, opts.timers);
    if (!samePlan(plan, nextPlan)) {
      plan = nextPlan;
      startTimers();
    }
  });

  startTimers();
  runtime.invalidate();
  logger.info({ width: opts.width, theme: initial.theme }, "bar started");

  return {
    runtime,
    store,
    registry,
    logger,
    get timerPlan() {
      return plan;
    },
    dispatch(ev) {
      runtime.dispatch(ev);
    },
    menuFor(moduleId) {
      return buildModuleMenu(registry, moduleId, store.snapshot());
    },
    selectMenuItem(moduleId, itemId) {
      if (runMenuAction(registry, moduleId, itemId, store.snapshot())) return true;
      const patch = applyMenuSelection(registry, moduleId, itemId, store.snapshot());
      if (patch === null) return false;
      store.update(patch);
      return true;
    },
    stop() {
      if (stopped) return;
      stopped = true;
      clearTimers();
      if (paintHandle !== null) clearImmediate(paintHandle);
      paintHandle = null;
      unsubscribe();
      runtime.dispose();
      registry.disposeAll();
      logger.info("bar stopped");
    },
  };
}
