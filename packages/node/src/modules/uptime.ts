import { uptime as osUptime } from "node:os";
import type { BarConfig, BarModule, UptimeOptions } from "@stripbar/core";
import { plural } from "./format.js";

type Split = Readonly<{ days: number; hours: number; minutes: number; seconds: number }>;

function split(totalSeconds: number): Split {
  const s = Math.max(0, Math.floor(Number.isFinite(totalSeconds) ? totalSeconds : 0));
  return {
    days: Math.floor(s / 86_400),
    hours: Math.floor((s % 86_400) / 3600),
    minutes: Math.floor((s % 3600) / 60),
    seconds: s % 60,
  };
}

export function formatUptime(totalSeconds: number, opts: UptimeOptions): string {
  const { days, hours, minutes } = split(totalSeconds);
  if (opts.compact) {
    if (days > 0 && opts.showDays) return `⏱ ${String(days)}d ${String(hours)}h`;
    if (hours > 0) return `⏱ ${String(hours)}h ${String(minutes)}m`;
    return `⏱ ${String(minutes)}m`;
  }
  if (days > 0 && opts.showDays) return `⏱ ${plural(days, "day", "days")}, ${plural(hours, "hour", "hours")}`;
  if (hours > 0) return `⏱ ${plural(hours, "hour", "hours")}, ${plural(minutes, "minute", "minutes")}`;
  return `⏱ ${plural(minutes, "minute", "minutes")}`;
}

/** Every unit down to seconds, for the tooltip. */
export function formatUptimeLong(totalSeconds: number): string {
  const { days, hours, minutes, seconds } = split(totalSeconds);
  if (days > 0) {
    return `${String(days)} days, ${String(hours)} hours, ${String(minutes)} minutes, ${String(seconds)} seconds`;
  }
  if (hours > 0) return `${String(hours)} hours, ${String(minutes)} minutes, ${String(seconds)} seconds`;
  if (minutes > 0) return `${String(minutes)} minutes, ${String(seconds)} seconds`;
  return `${String(seconds)} seconds`;
}

export class UptimeModule implements BarModule {
  readonly id = "uptime";
  readonly name = "System Uptime";
  private readonly source: () => number;
  private seconds: number;

  constructor(opts: Readonly<{ uptimeSeconds?: () => number }> = {}) {
    this.source = opts.uptimeSeconds ?? osUptime;
    this.seconds = this.source();
  }

  update(_config: BarConfig): void {
    this.seconds = this.source();
  }

  displayText(config: BarConfig): string {
    return formatUptime(this.seconds, config.modules.uptime);
  }

  tooltip(): string {
    return `System Uptime\n${formatUptimeLong(this.seconds)}`;
  }
}
