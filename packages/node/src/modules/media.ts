/**
 * Now-playing state from an MPRIS player through playerctl. Clicks and
 * scrolls are sent to playerctl as commands; the shown playback state flips
 * at once and the next probe reports what the player really did.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BarConfig, MediaOptions, ModuleActionContext } from "@stripbar/core";
import { truncateText } from "./format.js";
import { type ModuleDeps, PolledModule } from "./polledModule.js";

const execFileAsync = promisify(execFile);

export type PlaybackStatus = "playing" | "paused" | "stopped";

export type NowPlaying = Readonly<{
  status: PlaybackStatus;
  title: string;
  artist: string;
  album: string;
}>;

export type MediaProbe = () => Promise<NowPlaying>;

const PROBE_INTERVAL_MS = 2000;
const MAX_ARTIST_CHARS = 20;
const FIELD_SEPARATOR = "\t";
const PLAYERCTL_FORMAT = ["{{status}}", "{{title}}", "{{artist}}", "{{album}}"].join(FIELD_SEPARATOR);

export const NOTHING_PLAYING: NowPlaying = Object.freeze({ status: "stopped", title: "", artist: "", album: "" });

function statusOf(raw: string): PlaybackStatus {
  const v = raw.trim().toLowerCase();
  if (v === "playing") return "playing";
  if (v === "paused") return "paused";
  return "stopped";
}

/** One line of `playerctl metadata --format` output, fields tab-separated. */
export function parsePlayerctlLine(line: string): NowPlaying {
  const [status = "", title = "", artist = "", album = ""] = line.replace(/\r?\n$/u, "").split(FIELD_SEPARATOR);
  return { status: statusOf(status), title: title.trim(), artist: artist.trim(), album: album.trim() };
}

/** Resolves to NOTHING_PLAYING when no player runs or playerctl is missing. */
export function playerctlProbe(): MediaProbe {
  return async () => {
    try {
      const { stdout } = await execFileAsync("playerctl", ["metadata", "--format", PLAYERCTL_FORMAT], {
        timeout: 1000,
      });
      return parsePlayerctlLine(stdout);
    } catch {
      return NOTHING_PLAYING;
    }
  };
}

export function formatMedia(np: NowPlaying, opts: MediaOptions): string {
  if (np.status === "stopped") return "";
  const icon = np.status === "playing" ? "▶" : "⏸";
  if (!opts.showNowPlaying || np.title === "") return icon;
  const artist = np.artist === "" ? "" : ` - ${truncateText(np.artist, MAX_ARTIST_CHARS)}`;
  return `${icon} ${truncateText(np.title, opts.maxTitleLength)}${artist}`;
}

export function formatMediaTooltip(np: NowPlaying): string {
  if (np.status === "stopped") return "No media playing";
  const lines: string[] = [];
  if (np.title !== "") lines.push(np.title);
  if (np.artist !== "") lines.push(`Artist: ${np.artist}`);
  if (np.album !== "") lines.push(`Album: ${np.album}`);
  lines.push(`Status: ${np.status === "playing" ? "Playing" : "Paused"}`);
  return lines.join("\n");
}

export class MediaModule extends PolledModule<NowPlaying> {
  readonly id = "media";
  readonly name = "Media Controls";
  private readonly mediaProbe: MediaProbe;

  constructor(deps: ModuleDeps & Readonly<{ probe?: MediaProbe }>) {
    super(NOTHING_PLAYING, deps);
    this.mediaProbe = deps.probe ?? playerctlProbe();
  }

  protected intervalMs(_config: BarConfig): number {
    return PROBE_INTERVAL_MS;
  }

  protected probe(_config: BarConfig): Promise<NowPlaying> {
    return this.mediaProbe();
  }

  get nowPlaying(): NowPlaying {
    return this.current;
  }

  isVisible(): boolean {
    return this.current.status !== "stopped";
  }

  displayText(config: BarConfig): string {
    return formatMedia(this.current, config.modules.media);
  }

  tooltip(): string {
    return formatMediaTooltip(this.current);
  }

  onClick(ctx: ModuleActionContext): void {
    const np = this.current;
    if (np.status === "stopped") return;
    this.publishNow({ ...np, status: np.status === "playing" ? "paused" : "playing" });
    ctx.requestCommand({ kind: "runCommand", command: "playerctl", args: ["play-pause"] });
  }

  onScroll(delta: number, ctx: ModuleActionContext): void {
    if (delta === 0 || this.current.status === "stopped") return;
    ctx.requestCommand({ kind: "runCommand", command: "playerctl", args: [delta > 0 ? "next" : "previous"] });
  }
}
