/**
 * stripbar-preview: draws the bar as one line of the terminal and keeps it
 * updated until interrupted. `--once` prints a single frame and exits.
 */

import { exit, stderr, stdout } from "node:process";
import { describeThrown } from "@stripbar/core";
import { pino } from "pino";
import { TextGridRasterizer, gridFrameToAnsi, gridFrameToText } from "./backend/textGridRasterizer.js";
import { createNodeBar } from "./host/nodeBar.js";
import { createLogger } from "./logger.js";

type CliOptions = {
  columns: number | null;
  once: boolean;
  plain: boolean;
  help: boolean;
};

const CELL_WIDTH = 8;
const CELL_HEIGHT = 16;

function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { columns: null, once: false, plain: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--once") {
      options.once = true;
      continue;
    }
    if (arg === "--plain") {
      options.plain = true;
      continue;
    }
    if (arg === "--columns" || arg === "-c") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for --columns");
      options.columns = parseColumns(value);
      i++;
      continue;
    }
    if (arg.startsWith("--columns=")) {
      options.columns = parseColumns(arg.slice("--columns=".length));
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }
  return options;
}

function parseColumns(raw: string): number {
  const n = Number.parseInt(raw, 10);
  if (!Number.isInteger(n) || n < 10) throw new Error(`--columns must be an integer of at least 10 (got ${raw})`);
  return n;
}

function printHelp(): void {
  stdout.write(
    [
      "Usage: stripbar-preview [options]",
      "",
      "Options:",
      "  -c, --columns <n>  Bar width in terminal columns (default: terminal width)",
      "      --once         Print one frame and exit",
      "      --plain        No colors",
      "  -h, --help         Show this help",
      "",
      "Environment: LOG_LEVEL, STRIPBAR_LOG_PRETTY, STRIPBAR_THEME, STRIPBAR_BAR_HEIGHT,",
      "             STRIPBAR_ACCENT, STRIPBAR_LEFT, STRIPBAR_CENTER, STRIPBAR_RIGHT",
      "",
    ].join("\n"),
  );
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    printHelp();
    return;
  }
  const columns = options.columns ?? stdout.columns ?? 120;
  const render = options.plain ? gridFrameToText : gridFrameToAnsi;

  let stopBar: (() => void) | null = null;
  const rasterizer = new TextGridRasterizer({
    cellWidth: CELL_WIDTH,
    cellHeight: CELL_HEIGHT,
    onPresent: (frame) => {
      stdout.write(options.once ? `${render(frame)}\n` : `\r${render(frame)}`);
      if (options.once) setImmediate(() => stopBar?.());
    },
  });

  const bar = createNodeBar({
    width: columns * CELL_WIDTH,
    height: CELL_HEIGHT,
    rasterizer,
    // stdout carries the bar itself
    logger: createLogger({ destination: pino.destination(2) }),
    timers: { enabled: !options.once },
  });
  stopBar = () => bar.stop();

  process.once("SIGINT", () => {
    bar.stop();
    stdout.write("\n");
  });
}

try {
  main();
} catch (err: unknown) {
  stderr.write(`${describeThrown(err)}\n`);
  exit(1);
}
