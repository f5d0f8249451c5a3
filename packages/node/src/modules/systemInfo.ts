import { cpus, freemem, totalmem } from "node:os";
import type { BarConfig, BarModule, SystemInfoOptions } from "@stripbar/core";
import { clampPercent, formatBytes } from "./format.js";

export type SystemSample = Readonly<{
  /** Cumulative CPU time over all cores, in ms. */
  cpuIdleMs: number;
  cpuTotalMs: number;
  memTotal: number;
  memFree: number;
}>;

export type SystemSampler = () => SystemSample;

const SAMPLE_INTERVAL_MS = 2000;

export function sampleSystem(): SystemSample {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { cpuIdleMs: idle, cpuTotalMs: total, memTotal: totalmem(), memFree: freemem() };
}

/** Busy share of the CPU time that elapsed between two samples. */
export function cpuPercent(prev: SystemSample, next: SystemSample): number {
  const total = next.cpuTotalMs - prev.cpuTotalMs;
  const idle = next.cpuIdleMs - prev.cpuIdleMs;
  if (total <= 0) return 0;
  return clampPercent(((total - idle) / total) * 100);
}

export function memPercent(sample: SystemSample): number {
  if (sample.memTotal <= 0) return 0;
  return clampPercent(((sample.memTotal - sample.memFree) / sample.memTotal) * 100);
}

export function formatSystemInfo(cpu: number, mem: number, opts: SystemInfoOptions): string {
  const parts: string[] = [];
  if (opts.showCpu) parts.push(`CPU ${cpu.toFixed(0)}%`);
  if (opts.showMemory) parts.push(`MEM ${mem.toFixed(0)}%`);
  return parts.join("  ");
}

/** CPU load and memory use. Sampling is a couple of cheap syscalls, done inline every two seconds. */
export class SystemInfoModule implements BarModule {
  readonly id = "system_info";
  readonly name = "System Info";
  private readonly sampler: SystemSampler;
  private readonly now: () => number;
  private prev: SystemSample;
  private last: SystemSample;
  private lastSampleMs: number;
  private cpu = 0;

  constructor(opts: Readonly<{ sampler?: SystemSampler; now?: () => number }> = {}) {
    this.sampler = opts.sampler ?? sampleSystem;
    this.now = opts.now ?? (() => performance.now());
    this.prev = this.sampler();
    this.last = this.prev;
    this.lastSampleMs = this.now();
  }

  update(_config: BarConfig): void {
    const now = this.now();
    if (now - this.lastSampleMs < SAMPLE_INTERVAL_MS) return;
    this.lastSampleMs = now;
    this.prev = this.last;
    this.last = this.sampler();
    this.cpu = cpuPercent(this.prev, this.last);
  }

  displayText(config: BarConfig): string {
    return formatSystemInfo(this.cpu, memPercent(this.last), config.modules.systemInfo);
  }

  widthSample(config: BarConfig): string {
    return formatSystemInfo(100, 100, config.modules.systemInfo);
  }

  tooltip(): string {
    const used = this.last.memTotal - this.last.memFree;
    return (
      `CPU Usage: ${this.cpu.toFixed(1)}%\n` +
      `Memory: ${formatBytes(used)} / ${formatBytes(this.last.memTotal)} (${memPercent(this.last).toFixed(1)}%)`
    );
  }
}
