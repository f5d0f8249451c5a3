/**
 * Output volume. Input handlers update the shown state at once and push the
 * change to the backend in a background task, which then publishes what the
 * backend reports back.
 */

import type { BarConfig, ModuleActionContext, VolumeOptions } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

export type VolumeState = Readonly<{ level: number; muted: boolean }>;

export interface VolumeBackend {
  read(): Promise<VolumeState>;
  write(state: VolumeState): Promise<void>;
}

const PROBE_INTERVAL_MS = 5000;

/** Process-local mixer; used where no system mixer is wired in. */
export class MemoryVolumeBackend implements VolumeBackend {
  private state: VolumeState;

  constructor(initial: VolumeState = { level: 50, muted: false }) {
    this.state = initial;
  }

  async read(): Promise<VolumeState> {
    return this.state;
  }

  async write(state: VolumeState): Promise<void> {
    this.state = state;
  }
}

export function volumeIcon(state: VolumeState): string {
  if (state.muted || state.level === 0) return "🔇";
  if (state.level < 33) return "🔈";
  if (state.level < 66) return "🔉";
  return "🔊";
}

export function formatVolume(state: VolumeState, opts: VolumeOptions): string {
  const icon = volumeIcon(state);
  return opts.showPercentage ? `${icon} ${String(state.level)}%` : icon;
}

export function stepVolume(level: number, delta: number, step: number): number {
  const next = delta > 0 ? level + step : delta < 0 ? level - step : level;
  return Math.min(100, Math.max(0, Math.round(next)));
}

export class VolumeModule extends PolledModule<VolumeState> {
  readonly id = "volume";
  readonly name = "Volume";
  private readonly backend: VolumeBackend;

  constructor(deps: ModuleDeps & Readonly<{ backend?: VolumeBackend; initial?: VolumeState }>) {
    super(deps.initial ?? { level: 50, muted: false }, deps);
    this.backend = deps.backend ?? new MemoryVolumeBackend(deps.initial);
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<VolumeState> {
    return this.backend.read();
  }

  get state(): VolumeState {
    return this.current;
  }

  displayText(config: BarConfig): string {
    return formatVolume(this.current, config.modules.volume);
  }

  widthSample(config: BarConfig): string {
    return formatVolume({ level: 100, muted: false }, config.modules.volume);
  }

  tooltip(): string {
    const muted = this.current.muted ? " (Muted)" : "";
    return `Volume: ${String(this.current.level)}%${muted}`;
  }

  onClick(_ctx: ModuleActionContext): void {
    this.apply({ ...this.current, muted: !this.current.muted });
  }

  onScroll(delta: number, ctx: ModuleActionContext): void {
    const level = stepVolume(this.current.level, delta, ctx.config.modules.volume.scrollStep);
    if (level !== this.current.level) this.apply({ ...this.current, level });
  }

  onRightClick(ctx: ModuleActionContext): void {
    ctx.requestCommand({ kind: "runCommand", command: "pavucontrol", args: [] });
  }

  private apply(next: VolumeState): void {
    this.publishNow(next);
    this.startTask(async () => {
      await this.backend.write(next);
      return this.backend.read();
    });
  }
}
