/**
 * Clipboard history. Each probe reads the system clipboard and records new
 * text at the front of the history; choosing an entry from the menu writes
 * it back to the clipboard.
 */

import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import { type BarConfig, StripbarError } from "@stripbar/core";
import { truncateText } from "./format.js";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

export interface ClipboardBackend {
  /** Current text content; null when the clipboard holds no text. */
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

const PROBE_INTERVAL_MS = 1000;
const TOOLTIP_CHARS = 80;

type ClipboardTools = Readonly<{ read: readonly string[]; write: readonly string[] }>;

const WAYLAND_TOOLS: ClipboardTools = { read: ["wl-paste", "--no-newline"], write: ["wl-copy"] };
const X11_TOOLS: ClipboardTools = {
  read: ["xclip", "-selection", "clipboard", "-o"],
  write: ["xclip", "-selection", "clipboard", "-i"],
};

function pipeInto(argv: readonly string[], text: string): Promise<void> {
  const [command = "", ...args] = argv;
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "ignore", "ignore"] });
    child.on("error", reject);
    child.on("close", (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new StripbarError("STRIPBAR_BACKGROUND_TASK_FAILURE", `${command} exited with code ${String(code)}`));
      }
    });
    child.stdin.end(text);
  });
}

/** wl-clipboard under Wayland, xclip otherwise. */
export class CommandClipboardBackend implements ClipboardBackend {
  private readonly tools: ClipboardTools;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const wayland = env.WAYLAND_DISPLAY;
    this.tools = wayland !== undefined && wayland !== "" ? WAYLAND_TOOLS : X11_TOOLS;
  }

  async read(): Promise<string | null> {
    const [command = "", ...args] = this.tools.read;
    try {
      const { stdout } = await execFileAsync(command, args, { timeout: 1000, maxBuffer: 1024 * 1024 });
      return stdout;
    } catch {
      return null;
    }
  }

  write(text: string): Promise<void> {
    return pipeInto(this.tools.write, text);
  }
}

/** Process-local clipboard; used in tests and where no clipboard tool exists. */
export class MemoryClipboardBackend implements ClipboardBackend {
  private text: string | null;

  constructor(initial: string | null = null) {
    this.text = initial;
  }

  async read(): Promise<string | null> {
    return this.text;
  }

  async write(text: string): Promise<void> {
    this.text = text;
  }
}

/**
 * History with `text` in front. Blank text and a repeat of the newest entry
 * leave it unchanged; an older copy of `text` moves to the front.
 */
export function pushHistory(history: readonly string[], text: string | null, maxEntries: number): readonly string[] {
  if (text === null || text.trim() === "" || history[0] === text) return history;
  return [text, ...history.filter((entry) => entry !== text)].slice(0, maxEntries);
}

/** One-line preview of an entry for menus and tooltips. */
export function previewEntry(text: string, maxChars: number): string {
  return truncateText(text.replace(/\s+/gu, " ").trim(), maxChars);
}

export class ClipboardModule extends PolledModule<readonly string[]> {
  readonly id = "clipboard";
  readonly name = "Clipboard";
  private readonly backend: ClipboardBackend;

  constructor(deps: ModuleDeps & Readonly<{ backend?: ClipboardBackend }>) {
    super([], deps);
    this.backend = deps.backend ?? new CommandClipboardBackend();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected async probe(config: BarConfig): Promise<readonly string[]> {
    const text = await this.backend.read();
    return pushHistory(this.cell.read(), text, config.modules.clipboard.maxEntries);
  }

  /** Newest first. */
  get history(): readonly string[] {
    return this.current;
  }

  displayText(_config: BarConfig): string {
    return "📋";
  }

  tooltip(): string {
    const [newest] = this.current;
    if (newest === undefined) return "No clipboard history";
    const count = this.current.length;
    return `${previewEntry(newest, TOOLTIP_CHARS)}\n${String(count)} ${count === 1 ? "entry" : "entries"}`;
  }

  /** Put a history entry back on the clipboard. False for an index outside the history. */
  restore(index: number): boolean {
    const entry = this.current[index];
    if (entry === undefined) return false;
    this.publishNow([entry, ...this.current.filter((_, i) => i !== index)]);
    this.startTask(async () => {
      await this.backend.write(entry);
      return this.cell.read();
    });
    return true;
  }

  clear(): void {
    this.publishNow([]);
  }
}
