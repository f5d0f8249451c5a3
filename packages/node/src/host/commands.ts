/**
 * packages/node/src/host/commands.ts — Default handling of module commands.
 *
 * URLs and external programs are started detached with their output
 * discarded; a spawn failure is logged and otherwise ignored.
 */

import { type ChildProcess, type SpawnOptions, spawn } from "node:child_process";
import { type BarLogger, type ModuleCommand, describeThrown } from "@stripbar/core";

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export type CommandRunnerOptions = Readonly<{
  logger: BarLogger;
  platform?: NodeJS.Platform;
  spawn?: SpawnFn;
  /** Receives `showMenu`; without it the request is only logged. */
  onShowMenu?: (moduleId: string, command: Extract<ModuleCommand, { kind: "showMenu" }>) => void;
}>;

/** Program and arguments that open `url` with the desktop's default handler. */
export function openUrlCommand(url: string, platform: NodeJS.Platform): Readonly<{ command: string; args: readonly string[] }> {
  if (platform === "darwin") return { command: "open", args: [url] };
  if (platform === "win32") return { command: "cmd", args: ["/c", "start", "", url] };
  return { command: "xdg-open", args: [url] };
}

export function createCommandRunner(opts: CommandRunnerOptions): (command: ModuleCommand) => void {
  const platform = opts.platform ?? process.platform;
  const spawnFn: SpawnFn = opts.spawn ?? ((command, args, options) => spawn(command, [...args], options));
  const logger = opts.logger;

  const launch = (command: string, args: readonly string[]): void => {
    let child: ChildProcess;
    try {
      child = spawnFn(command, args, { detached: true, stdio: "ignore" });
    } catch (err: unknown) {
      logger.warn({ command, detail: describeThrown(err) }, "command failed to start");
      return;
    }
    child.on("error", (err) => {
      logger.warn({ command, detail: describeThrown(err) }, "command failed to start");
    });
    child.unref();
    logger.debug({ command, args }, "command started");
  };

  return (command) => {
    switch (command.kind) {
      case "openUrl": {
        const { command: program, args } = openUrlCommand(command.url, platform);
        launch(program, args);
        return;
      }
      case "runCommand":
        launch(command.command, command.args);
        return;
      case "showMenu":
        if (opts.onShowMenu) {
          opts.onShowMenu(command.moduleId, command);
        } else {
          logger.info({ moduleId: command.moduleId, anchor: command.anchor }, "menu requested");
        }
        return;
    }
  };
}
