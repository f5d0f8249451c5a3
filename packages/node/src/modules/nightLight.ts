import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BarConfig, ModuleActionContext } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

export interface NightLightBackend {
  /** Null when the state cannot be read. */
  read(): Promise<boolean | null>;
  write(enabled: boolean): Promise<void>;
}

const PROBE_INTERVAL_MS = 5000;
const GSETTINGS_SCHEMA = "org.gnome.settings-daemon.plugins.color";
const GSETTINGS_KEY = "night-light-enabled";

/** GNOME's colour plugin through gsettings. */
export class GsettingsNightLightBackend implements NightLightBackend {
  async read(): Promise<boolean | null> {
    try {
      const { stdout } = await execFileAsync("gsettings", ["get", GSETTINGS_SCHEMA, GSETTINGS_KEY], { timeout: 1000 });
      const v = stdout.trim();
      return v === "true" ? true : v === "false" ? false : null;
    } catch {
      return null;
    }
  }

  async write(enabled: boolean): Promise<void> {
    await execFileAsync("gsettings", ["set", GSETTINGS_SCHEMA, GSETTINGS_KEY, String(enabled)], { timeout: 1000 });
  }
}

export function nightLightIcon(enabled: boolean | null): string {
  if (enabled === null) return "🌓";
  return enabled ? "🌙" : "☀";
}

export class NightLightModule extends PolledModule<boolean | null> {
  readonly id = "night_light";
  readonly name = "Night Light";
  private readonly backend: NightLightBackend;

  constructor(deps: ModuleDeps & Readonly<{ backend?: NightLightBackend }>) {
    super(null, deps);
    this.backend = deps.backend ?? new GsettingsNightLightBackend();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<boolean | null> {
    return this.backend.read();
  }

  get enabled(): boolean | null {
    return this.current;
  }

  displayText(_config: BarConfig): string {
    return nightLightIcon(this.current);
  }

  tooltip(): string {
    const state = this.current === null ? "Unknown" : this.current ? "ON" : "OFF";
    return `Night Light: ${state}\nClick to toggle`;
  }

  onClick(_ctx: ModuleActionContext): void {
    const next = this.current !== true;
    this.publishNow(next);
    this.startTask(async () => {
      await this.backend.write(next);
      return this.backend.read();
    });
  }
}
