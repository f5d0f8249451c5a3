import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BarConfig } from "@stripbar/core";
import { truncateText } from "./format.js";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

export type ActiveWindow = Readonly<{ processName: string; title: string }>;
export type ActiveWindowProbe = () => Promise<ActiveWindow | null>;

const PROBE_INTERVAL_MS = 500;
const MAX_TITLE_CHARS = 50;

/**
 * X11 probe through xdotool. Resolves to null when there is no display or
 * the tool is missing.
 */
export function xdotoolProbe(env: NodeJS.ProcessEnv = process.env): ActiveWindowProbe {
  return async () => {
    if (env.DISPLAY === undefined || env.DISPLAY === "") return null;
    try {
      const title = await execFileAsync("xdotool", ["getactivewindow", "getwindowname"], { timeout: 1000 });
      const pid = await execFileAsync("xdotool", ["getactivewindow", "getwindowpid"], { timeout: 1000 });
      const comm = await execFileAsync("ps", ["-o", "comm=", "-p", pid.stdout.trim()], { timeout: 1000 });
      return { processName: comm.stdout.trim(), title: title.stdout.trim() };
    } catch {
      return null;
    }
  };
}

/** Process name without a ".exe" suffix, first letter upper-cased; "Desktop" when nothing has focus. */
export function formatActiveApp(win: ActiveWindow | null): string {
  const raw = win?.processName.replace(/\.exe$/iu, "") ?? "";
  if (raw === "") return "Desktop";
  const [first = "", ...rest] = [...raw];
  return truncateText(first.toUpperCase() + rest.join(""), MAX_TITLE_CHARS);
}

export class ActiveAppModule extends PolledModule<ActiveWindow | null> {
  readonly id = "active_app";
  readonly name = "Active Application";
  private readonly windowProbe: ActiveWindowProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: ActiveWindowProbe }>) {
    super(null, deps);
    this.windowProbe = deps.probe ?? xdotoolProbe();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<ActiveWindow | null> {
    return this.windowProbe();
  }

  displayText(_config: BarConfig): string {
    return formatActiveApp(this.current);
  }

  emphasized(): boolean {
    return true;
  }

  tooltip(): string | null {
    const win = this.current;
    if (win === null) return null;
    return win.title === "" ? win.processName : `${win.processName}\n${win.title}`;
  }
}
