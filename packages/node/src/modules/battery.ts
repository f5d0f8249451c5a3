import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import type { BarConfig, BatteryOptions } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

export type BatteryStatus = Readonly<{
  percent: number;
  charging: boolean;
  pluggedIn: boolean;
}>;

/** Resolves to null when the machine has no battery. */
export type BatteryProbe = () => Promise<BatteryStatus | null>;

const POWER_SUPPLY_DIR = "/sys/class/power_supply";
const PROBE_INTERVAL_MS = 30_000;
const LOW_PERCENT = 30;

async function readAttr(dir: string, name: string): Promise<string> {
  return (await readFile(join(dir, name), "utf8")).trim();
}

/** Map the kernel's `status` attribute onto charging / plugged-in flags. */
export function parsePowerSupplyStatus(percentRaw: string, statusRaw: string): BatteryStatus | null {
  const percent = Number.parseInt(percentRaw, 10);
  if (!Number.isFinite(percent)) return null;
  const status = statusRaw.toLowerCase();
  const charging = status === "charging";
  return {
    percent: Math.min(100, Math.max(0, percent)),
    charging,
    pluggedIn: charging || status === "full" || status === "not charging",
  };
}

export function sysfsBatteryProbe(root = POWER_SUPPLY_DIR): BatteryProbe {
  return async () => {
    let entries: string[];
    try {
      entries = await readdir(root);
    } catch {
      return null;
    }
    for (const entry of entries.sort()) {
      const dir = join(root, entry);
      const type = await readAttr(dir, "type").catch(() => "");
      if (type !== "Battery") continue;
      return parsePowerSupplyStatus(await readAttr(dir, "capacity"), await readAttr(dir, "status"));
    }
    return null;
  };
}

export function batteryIcon(status: BatteryStatus): string {
  if (status.pluggedIn && !status.charging) return "🔌";
  if (status.charging) return "⚡";
  if (status.percent >= LOW_PERCENT) return "🔋";
  return "🪫";
}

export function formatBattery(status: BatteryStatus, opts: BatteryOptions): string {
  const icon = batteryIcon(status);
  return opts.showPercentage ? `${icon} ${String(status.percent)}%` : icon;
}

export function formatBatteryTooltip(status: BatteryStatus | null): string {
  if (status === null) return "No battery detected";
  const state = status.charging ? "Charging" : status.pluggedIn ? "Plugged in" : "On battery";
  return `Battery: ${String(status.percent)}%\nStatus: ${state}`;
}

export class BatteryModule extends PolledModule<BatteryStatus | null> {
  readonly id = "battery";
  readonly name = "Battery";
  private readonly batteryProbe: BatteryProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: BatteryProbe }>) {
    super(null, deps);
    this.batteryProbe = deps.probe ?? sysfsBatteryProbe();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<BatteryStatus | null> {
    return this.batteryProbe();
  }

  isVisible(): boolean {
    return this.current !== null;
  }

  displayText(config: BarConfig): string {
    return this.current === null ? "" : formatBattery(this.current, config.modules.battery);
  }

  tooltip(): string {
    return formatBatteryTooltip(this.current);
  }
}
