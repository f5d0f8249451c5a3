import { type NetworkInterfaceInfo, networkInterfaces } from "node:os";
import type { BarConfig, ModuleActionContext, NetworkOptions } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

export type NetworkKind = "disconnected" | "ethernet" | "wifi" | "cellular" | "unknown";

export type NetworkStatus = Readonly<{ kind: NetworkKind; interfaceName: string | null }>;

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

const DISCONNECTED: NetworkStatus = Object.freeze({ kind: "disconnected", interfaceName: null });
const PROBE_INTERVAL_MS = 10_000;

const ICONS: Readonly<Record<NetworkKind, string>> = {
  disconnected: "📵",
  ethernet: "🔗",
  wifi: "📶",
  cellular: "📶",
  unknown: "🌐",
};

const LABELS: Readonly<Record<NetworkKind, string>> = {
  disconnected: "Not connected",
  ethernet: "Ethernet",
  wifi: "Wi-Fi",
  cellular: "Cellular",
  unknown: "Unknown",
};

function kindOfInterface(name: string): NetworkKind {
  if (/^(wl|wlan|wifi)/u.test(name)) return "wifi";
  if (/^(en|eth)/u.test(name)) return "ethernet";
  if (/^(ww|rmnet|wwan)/u.test(name)) return "cellular";
  return "unknown";
}

const RANK: Readonly<Record<NetworkKind, number>> = {
  ethernet: 0,
  wifi: 1,
  cellular: 2,
  unknown: 3,
  disconnected: 4,
};

/** The best external interface with an address; wired beats wireless. */
export function classifyInterfaces(table: InterfaceTable): NetworkStatus {
  let best: NetworkStatus = DISCONNECTED;
  for (const [name, addrs] of Object.entries(table)) {
    if (addrs === undefined || !addrs.some((a) => !a.internal)) continue;
    const kind = kindOfInterface(name);
    if (RANK[kind] < RANK[best.kind]) best = { kind, interfaceName: name };
  }
  return best;
}

export function formatNetwork(status: NetworkStatus, opts: NetworkOptions): string {
  let text = ICONS[status.kind];
  if (opts.showName && status.interfaceName !== null) text += ` ${status.interfaceName}`;
  return text;
}

export function formatNetworkTooltip(status: NetworkStatus): string {
  let text = `Network: ${LABELS[status.kind]}`;
  if (status.interfaceName !== null) text += `\nConnected to: ${status.interfaceName}`;
  return text;
}

export class NetworkModule extends PolledModule<NetworkStatus> {
  readonly id = "network";
  readonly name = "Network";
  private readonly readTable: () => InterfaceTable;

  constructor(deps: ModuleDeps & Readonly<{ interfaces?: () => InterfaceTable }>) {
    super(DISCONNECTED, deps);
    this.readTable = deps.interfaces ?? networkInterfaces;
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected async probe(_config: BarConfig): Promise<NetworkStatus> {
    return classifyInterfaces(this.readTable());
  }

  protected fallback(_err: unknown): NetworkStatus {
    return { kind: "unknown", interfaceName: null };
  }

  displayText(config: BarConfig): string {
    return formatNetwork(this.current, config.modules.network);
  }

  tooltip(): string {
    return formatNetworkTooltip(this.current);
  }

  onClick(ctx: ModuleActionContext): void {
    ctx.requestCommand({ kind: "runCommand", command: "nm-connection-editor", args: [] });
  }
}
