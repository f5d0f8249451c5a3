import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BarConfig, BluetoothOptions, ModuleActionContext } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

export type BluetoothPower = "unavailable" | "off" | "on";

/** Adapter power and the names of connected devices. */
export type BluetoothStatus = Readonly<{ power: BluetoothPower; devices: readonly string[] }>;

export type BluetoothProbe = () => Promise<BluetoothStatus>;

const PROBE_INTERVAL_MS = 10_000;
const ICON = "ᛒ";

export const NO_ADAPTER: BluetoothStatus = Object.freeze({ power: "unavailable", devices: Object.freeze([]) });

/** Power state from `bluetoothctl show`; "unavailable" without a controller. */
export function parseControllerPower(output: string): BluetoothPower {
  const match = /^\s*Powered:\s*(\w+)/mu.exec(output);
  if (match === null) return "unavailable";
  return match[1] === "yes" ? "on" : "off";
}

/** Device names from `bluetoothctl devices Connected` ("Device <address> <name>" lines). */
export function parseConnectedDevices(output: string): readonly string[] {
  const names: string[] = [];
  for (const line of output.split("\n")) {
    const name = /^Device\s+\S+\s+(.+)$/u.exec(line.trim())?.[1];
    if (name !== undefined) names.push(name.trim());
  }
  return names;
}

export function bluetoothctlProbe(): BluetoothProbe {
  return async () => {
    try {
      const show = await execFileAsync("bluetoothctl", ["show"], { timeout: 2000 });
      const power = parseControllerPower(show.stdout);
      if (power !== "on") return { power, devices: [] };
      const devices = await execFileAsync("bluetoothctl", ["devices", "Connected"], { timeout: 2000 });
      return { power, devices: parseConnectedDevices(devices.stdout) };
    } catch {
      return NO_ADAPTER;
    }
  };
}

export function formatBluetooth(status: BluetoothStatus, opts: BluetoothOptions): string {
  if (status.power === "unavailable") return "";
  if (status.power === "off") return `${ICON} off`;
  const [first, ...rest] = status.devices;
  if (first === undefined) return ICON;
  if (opts.showDeviceNames) return rest.length === 0 ? `${ICON} ${first}` : `${ICON} ${first} +${String(rest.length)}`;
  return opts.showDeviceCount ? `${ICON} ${String(status.devices.length)}` : ICON;
}

export function formatBluetoothTooltip(status: BluetoothStatus): string {
  switch (status.power) {
    case "unavailable":
      return "Bluetooth: Unavailable";
    case "off":
      return "Bluetooth: Off\nClick to turn on";
    case "on":
      return status.devices.length === 0
        ? "Bluetooth: On\nNo devices connected"
        : `Bluetooth: Connected\n${status.devices.join(", ")}`;
  }
}

export class BluetoothModule extends PolledModule<BluetoothStatus> {
  readonly id = "bluetooth";
  readonly name = "Bluetooth";
  private readonly bluetoothProbe: BluetoothProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: BluetoothProbe }>) {
    super(NO_ADAPTER, deps);
    this.bluetoothProbe = deps.probe ?? bluetoothctlProbe();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<BluetoothStatus> {
    return this.bluetoothProbe();
  }

  get status(): BluetoothStatus {
    return this.current;
  }

  isVisible(): boolean {
    return this.current.power !== "unavailable";
  }

  displayText(config: BarConfig): string {
    return formatBluetooth(this.current, config.modules.bluetooth);
  }

  tooltip(): string {
    return formatBluetoothTooltip(this.current);
  }

  /** Toggles adapter power. */
  onClick(ctx: ModuleActionContext): void {
    const power = this.current.power;
    if (power === "unavailable") return;
    const next: BluetoothPower = power === "on" ? "off" : "on";
    this.publishNow({ power: next, devices: [] });
    ctx.requestCommand({ kind: "runCommand", command: "bluetoothctl", args: ["power", next] });
  }
}
