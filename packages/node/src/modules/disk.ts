import { statfs } from "node:fs/promises";
import type { BarConfig } from "@stripbar/core";
import { formatBytes } from "./format.js";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

export type DiskUsage = Readonly<{ path: string; total: number; used: number }>;
export type DiskProbe = (path: string) => Promise<DiskUsage>;

export const statfsProbe: DiskProbe = async (path) => {
  const s = await statfs(path);
  const total = s.blocks * s.bsize;
  const free = s.bavail * s.bsize;
  return { path, total, used: Math.max(0, total - free) };
};

export function diskPercent(usage: DiskUsage): number {
  if (usage.total <= 0) return 0;
  return Math.floor((usage.used / usage.total) * 100);
}

export class DiskModule extends PolledModule<DiskUsage | null> {
  readonly id = "disk";
  readonly name = "Disk";
  private readonly diskProbe: DiskProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: DiskProbe }>) {
    super(null, deps);
    this.diskProbe = deps.probe ?? statfsProbe;
  }

  protected intervalMs(config: BarConfig): number {
    return config.modules.disk.refreshSeconds * 1000;
  }

  protected refreshKey(config: BarConfig): string {
    return config.modules.disk.path;
  }

  protected probe(config: BarConfig): Promise<DiskUsage | null> {
    return this.diskProbe(config.modules.disk.path);
  }

  displayText(_config: BarConfig): string {
    const usage = this.current;
    return usage === null ? "" : `💾 ${String(diskPercent(usage))}%`;
  }

  tooltip(): string | null {
    const usage = this.current;
    if (usage === null) return null;
    return `Disk Usage:\n${usage.path} ${formatBytes(usage.used)} / ${formatBytes(usage.total)} (${String(diskPercent(usage))}%)`;
  }
}
