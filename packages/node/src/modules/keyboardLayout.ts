import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BarConfig, KeyboardLayoutOptions, ModuleActionContext } from "@stripbar/core";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

/** Configured XKB layouts; the first one is active. Variants run parallel to layouts. */
export type KeyboardLayouts = Readonly<{ layouts: readonly string[]; variants: readonly string[] }>;

export type KeyboardLayoutProbe = () => Promise<KeyboardLayouts | null>;

const PROBE_INTERVAL_MS = 1000;

const KNOWN_LAYOUTS: Readonly<Record<string, Readonly<{ code: string; name: string }>>> = {
  us: { code: "EN", name: "English (US)" },
  gb: { code: "EN", name: "English (UK)" },
  de: { code: "DE", name: "German" },
  fr: { code: "FR", name: "French" },
  es: { code: "ES", name: "Spanish" },
  it: { code: "IT", name: "Italian" },
  pt: { code: "PT", name: "Portuguese" },
  br: { code: "PT", name: "Portuguese (Brazil)" },
  ru: { code: "RU", name: "Russian" },
  ua: { code: "UA", name: "Ukrainian" },
  pl: { code: "PL", name: "Polish" },
  nl: { code: "NL", name: "Dutch" },
  se: { code: "SV", name: "Swedish" },
  no: { code: "NO", name: "Norwegian" },
  dk: { code: "DA", name: "Danish" },
  fi: { code: "FI", name: "Finnish" },
  tr: { code: "TR", name: "Turkish" },
  jp: { code: "JA", name: "Japanese" },
  kr: { code: "KO", name: "Korean" },
  cn: { code: "ZH", name: "Chinese" },
};

function splitList(raw: string): string[] {
  return raw.split(",").map((s) => s.trim());
}

/** Layouts and variants from `setxkbmap -query`; null without a layout line. */
export function parseXkbQuery(output: string): KeyboardLayouts | null {
  let layouts: string[] = [];
  let variants: string[] = [];
  for (const line of output.split("\n")) {
    const match = /^(\w+):\s*(.*)$/u.exec(line.trim());
    if (match === null) continue;
    const [, key = "", value = ""] = match;
    if (key === "layout") layouts = splitList(value).filter((l) => l !== "");
    if (key === "variant") variants = splitList(value);
  }
  if (layouts.length === 0) return null;
  return { layouts, variants: layouts.map((_, i) => variants[i] ?? "") };
}

export function setxkbmapProbe(): KeyboardLayoutProbe {
  return async () => {
    try {
      const { stdout } = await execFileAsync("setxkbmap", ["-query"], { timeout: 1000 });
      return parseXkbQuery(stdout);
    } catch {
      return null;
    }
  };
}

/** Short code and display name of an XKB layout; unknown layouts use their own name. */
export function describeLayout(layout: string): Readonly<{ code: string; name: string }> {
  return KNOWN_LAYOUTS[layout] ?? { code: layout.slice(0, 2).toUpperCase(), name: layout };
}

export function formatKeyboardLayout(state: KeyboardLayouts | null, opts: KeyboardLayoutOptions): string {
  const active = state?.layouts[0];
  if (active === undefined) return "⌨ ??";
  const info = describeLayout(active);
  return `⌨ ${opts.showFullName ? info.name : info.code}`;
}

/** Next layout first; the previously active one moves to the end. */
export function rotateLayouts(state: KeyboardLayouts): KeyboardLayouts {
  const [first, ...rest] = state.layouts;
  const [firstVariant = "", ...restVariants] = state.variants;
  if (first === undefined || rest.length === 0) return state;
  return { layouts: [...rest, first], variants: [...restVariants, firstVariant] };
}

export function setxkbmapArgs(state: KeyboardLayouts): readonly string[] {
  const args = ["-layout", state.layouts.join(",")];
  if (state.variants.some((v) => v !== "")) args.push("-variant", state.variants.join(","));
  return args;
}

export class KeyboardLayoutModule extends PolledModule<KeyboardLayouts | null> {
  readonly id = "keyboard_layout";
  readonly name = "Keyboard Layout";
  private readonly layoutProbe: KeyboardLayoutProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: KeyboardLayoutProbe }>) {
    super(null, deps);
    this.layoutProbe = deps.probe ?? setxkbmapProbe();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<KeyboardLayouts | null> {
    return this.layoutProbe();
  }

  displayText(config: BarConfig): string {
    return formatKeyboardLayout(this.current, config.modules.keyboardLayout);
  }

  tooltip(): string {
    const active = this.current?.layouts[0];
    const name = active === undefined ? "Unknown" : describeLayout(active).name;
    return `Keyboard Layout: ${name}\nClick to switch layout`;
  }

  onClick(ctx: ModuleActionContext): void {
    const state = this.current;
    if (state === null || state.layouts.length < 2) return;
    const next = rotateLayouts(state);
    this.publishNow(next);
    ctx.requestCommand({ kind: "runCommand", command: "setxkbmap", args: setxkbmapArgs(next) });
  }
}
