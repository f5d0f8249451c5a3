import { execFile } from "node:child_process";
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import type { BarConfig, GpuOptions, ModuleActionContext } from "@stripbar/core";
import { clampPercent, formatBytes } from "./format.js";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

export type GpuSample = Readonly<{
  name: string;
  usagePercent: number | null;
  vramUsedBytes: number | null;
  vramTotalBytes: number | null;
  temperatureC: number | null;
}>;

/** Resolves to null when no GPU reports anything. */
export type GpuProbe = () => Promise<GpuSample | null>;

const DRM_DIR = "/sys/class/drm";
const PROBE_INTERVAL_MS = 2000;
const MIB = 1024 * 1024;

const PCI_VENDORS: Readonly<Record<string, string>> = {
  "0x1002": "AMD",
  "0x10de": "NVIDIA",
  "0x8086": "Intel",
};

function toNumber(raw: string | null): number | null {
  if (raw === null) return null;
  const n = Number.parseFloat(raw.trim());
  return Number.isFinite(n) ? n : null;
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return (await readFile(path, "utf8")).trim();
  } catch {
    return null;
  }
}

async function hwmonTemperature(deviceDir: string): Promise<number | null> {
  let entries: string[];
  try {
    entries = await readdir(join(deviceDir, "hwmon"));
  } catch {
    return null;
  }
  for (const entry of entries.sort()) {
    const milli = toNumber(await readOptional(join(deviceDir, "hwmon", entry, "temp1_input")));
    if (milli !== null) return milli / 1000;
  }
  return null;
}

/** First DRM card exposing load or VRAM counters (amdgpu does; most others do not). */
export function sysfsGpuProbe(root = DRM_DIR): GpuProbe {
  return async () => {
    let entries: string[];
    try {
      entries = await readdir(root);
    } catch {
      return null;
    }
    for (const card of entries.filter((e) => /^card\d+$/u.test(e)).sort()) {
      const dir = join(root, card, "device");
      const usagePercent = toNumber(await readOptional(join(dir, "gpu_busy_percent")));
      const vramUsedBytes = toNumber(await readOptional(join(dir, "mem_info_vram_used")));
      const vramTotalBytes = toNumber(await readOptional(join(dir, "mem_info_vram_total")));
      if (usagePercent === null && vramTotalBytes === null) continue;
      const vendor = (await readOptional(join(dir, "vendor")))?.toLowerCase() ?? "";
      return {
        name: `${PCI_VENDORS[vendor] ?? "GPU"} (${card})`,
        usagePercent,
        vramUsedBytes,
        vramTotalBytes,
        temperatureC: await hwmonTemperature(dir),
      };
    }
    return null;
  };
}

/**
 * First line of `nvidia-smi --query-gpu=utilization.gpu,memory.used,memory.total,temperature.gpu,name
 * --format=csv,noheader,nounits`. Memory is reported in MiB.
 */
export function parseNvidiaSmi(output: string): GpuSample | null {
  const line = output.split("\n").find((l) => l.trim() !== "");
  if (line === undefined) return null;
  const [usage = "", used = "", total = "", temp = "", ...name] = line.split(",");
  const usedMib = toNumber(used);
  const totalMib = toNumber(total);
  return {
    name: name.join(",").trim() || "NVIDIA",
    usagePercent: toNumber(usage),
    vramUsedBytes: usedMib === null ? null : usedMib * MIB,
    vramTotalBytes: totalMib === null ? null : totalMib * MIB,
    temperatureC: toNumber(temp),
  };
}

export function nvidiaSmiProbe(): GpuProbe {
  return async () => {
    try {
      const { stdout } = await execFileAsync(
        "nvidia-smi",
        ["--query-gpu=utilization.gpu,memory.used,memory.total,temperature.gpu,name", "--format=csv,noheader,nounits"],
        { timeout: 2000 },
      );
      return parseNvidiaSmi(stdout);
    } catch {
      return null;
    }
  };
}

/** sysfs first, then nvidia-smi. */
export function defaultGpuProbe(): GpuProbe {
  const sysfs = sysfsGpuProbe();
  const nvidia = nvidiaSmiProbe();
  return async () => (await sysfs()) ?? nvidia();
}

export function vramPercent(sample: GpuSample): number | null {
  if (sample.vramUsedBytes === null || sample.vramTotalBytes === null || sample.vramTotalBytes <= 0) return null;
  return Math.round(clampPercent((sample.vramUsedBytes / sample.vramTotalBytes) * 100));
}

export function formatGpu(sample: GpuSample, opts: GpuOptions): string {
  const parts: string[] = [];
  if (opts.showUsage && sample.usagePercent !== null) {
    parts.push(`GPU ${clampPercent(sample.usagePercent).toFixed(0)}%`);
  }
  const vram = vramPercent(sample);
  if (opts.showMemory && vram !== null) parts.push(`VRAM ${String(vram)}%`);
  if (opts.showTemperature && sample.temperatureC !== null) parts.push(`${sample.temperatureC.toFixed(0)}°C`);
  return parts.join("  ");
}

export function formatGpuTooltip(sample: GpuSample | null): string {
  if (sample === null) return "No GPU information";
  const lines: string[] = [];
  if (sample.usagePercent !== null) lines.push(`GPU Usage: ${clampPercent(sample.usagePercent).toFixed(1)}%`);
  if (sample.vramUsedBytes !== null && sample.vramTotalBytes !== null) {
    lines.push(`VRAM: ${formatBytes(sample.vramUsedBytes)} / ${formatBytes(sample.vramTotalBytes)}`);
  }
  if (sample.temperatureC !== null) lines.push(`Temperature: ${sample.temperatureC.toFixed(0)}°C`);
  lines.push(`Device: ${sample.name}`);
  return lines.join("\n");
}

export class GpuModule extends PolledModule<GpuSample | null> {
  readonly id = "gpu";
  readonly name = "GPU";
  private readonly gpuProbe: GpuProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: GpuProbe }>) {
    super(null, deps);
    this.gpuProbe = deps.probe ?? defaultGpuProbe();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<GpuSample | null> {
    return this.gpuProbe();
  }

  isVisible(): boolean {
    return this.current !== null;
  }

  displayText(config: BarConfig): string {
    return this.current === null ? "" : formatGpu(this.current, config.modules.gpu);
  }

  widthSample(config: BarConfig): string {
    const full: GpuSample = { name: "", usagePercent: 100, vramUsedBytes: 1, vramTotalBytes: 1, temperatureC: 100 };
    return formatGpu(full, config.modules.gpu);
  }

  tooltip(): string {
    return formatGpuTooltip(this.current);
  }

  onClick(ctx: ModuleActionContext): void {
    ctx.requestCommand({ kind: "runCommand", command: "gnome-system-monitor", args: [] });
  }
}
