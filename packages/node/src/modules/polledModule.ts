/**
 * packages/node/src/modules/polledModule.ts — Base for modules fed by background probes.
 *
 * update() runs on the UI loop and must return at once. It copies the last
 * published value out of the state cell and, when the refresh interval has
 * elapsed (or the refresh key changed), starts one probe as a background
 * task. A probe that is still in flight is never started twice.
 */

import {
  type AsyncBridge,
  type BarConfig,
  type BarLogger,
  type BarModule,
  ModuleStateCell,
} from "@stripbar/core";
import { type BackgroundTaskOutcome, spawnBackgroundTask } from "../workers/backgroundTask.js";

export type ModuleDeps = Readonly<{
  bridge: AsyncBridge;
  logger: BarLogger;
  /** Monotonic milliseconds; defaults to performance.now(). */
  now?: () => number;
}>;

export abstract class PolledModule<T> implements BarModule {
  abstract readonly id: string;
  abstract readonly name: string;

  protected readonly cell: ModuleStateCell<T>;
  protected readonly deps: ModuleDeps;
  /** Value read from the cell by the latest update(). */
  protected current: T;

  private lastStartMs: number | null = null;
  private lastKey: string | null = null;
  private pending: Promise<BackgroundTaskOutcome> | null = null;

  constructor(initial: T, deps: ModuleDeps) {
    this.cell = new ModuleStateCell(initial);
    this.current = initial;
    this.deps = deps;
  }

  abstract displayText(config: BarConfig): string;

  /** Milliseconds between two probes. */
  protected abstract intervalMs(config: BarConfig): number;

  /** Blocking work; runs outside the UI loop's frame. */
  protected abstract probe(config: BarConfig): Promise<T>;

  /** A different key forces a probe on the next update (e.g. a new location). */
  protected refreshKey(_config: BarConfig): string {
    return "";
  }

  /** Whether probing is wanted at all under this configuration. */
  protected probeEnabled(_config: BarConfig): boolean {
    return true;
  }

  /** Value published when a probe fails. Without it the previous value stays. */
  protected fallback?(err: unknown): T;

  update(config: BarConfig): void {
    this.current = this.cell.read();
    if (!this.probeEnabled(config) || this.cell.refreshing) return;

    const now = this.now();
    const key = this.refreshKey(config);
    const due =
      this.lastStartMs === null || key !== this.lastKey || now - this.lastStartMs >= this.intervalMs(config);
    if (!due) return;

    this.lastStartMs = now;
    this.lastKey = key;
    this.startTask(() => this.probe(config));
  }

  /** Published value and its version, for tests and menus. */
  get version(): number {
    return this.cell.version;
  }

  get refreshing(): boolean {
    return this.cell.refreshing;
  }

  /** Resolves once the most recently started task has settled. */
  async settled(): Promise<void> {
    if (this.pending !== null) await this.pending;
  }

  /** Publish a value computed on the UI loop (optimistic input handling). */
  protected publishNow(value: T): void {
    this.cell.publish(value);
    this.current = value;
  }

  protected startTask(run: () => Promise<T>): void {
    const fallback = this.fallback;
    this.pending = spawnBackgroundTask({
      moduleId: this.id,
      cell: this.cell,
      bridge: this.deps.bridge,
      logger: this.deps.logger,
      run,
      ...(fallback === undefined ? {} : { fallback: (err: unknown) => fallback.call(this, err) }),
    });
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : performance.now();
  }
}
