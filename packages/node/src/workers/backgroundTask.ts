/**
 * packages/node/src/workers/backgroundTask.ts — Fire-and-forget module refresh.
 *
 * A task runs its I/O off the UI loop, publishes the complete result into
 * the module's state cell and notifies the bridge. It never touches layout or
 * drag state, and the promise it returns never rejects: failures are logged,
 * optionally replaced by a fallback value, and the bridge is still notified so
 * the loop can show the placeholder.
 */

import { type AsyncBridge, type BarLogger, type ModuleStateCell, describeThrown } from "@stripbar/core";

export type BackgroundTaskOptions<T> = Readonly<{
  moduleId: string;
  cell: ModuleStateCell<T>;
  bridge: AsyncBridge;
  logger: BarLogger;
  run: () => Promise<T>;
  /** Published when `run` fails. Without it the previous value stays. */
  fallback?: (err: unknown) => T;
}>;

export type BackgroundTaskOutcome = Readonly<{ ok: boolean; version: number }>;

export async function spawnBackgroundTask<T>(opts: BackgroundTaskOptions<T>): Promise<BackgroundTaskOutcome> {
  const { moduleId, cell, bridge, logger } = opts;
  cell.taskStarted();
  try {
    const value = await opts.run();
    const version = cell.publish(value);
    logger.trace({ moduleId, version }, "background task published");
    return { ok: true, version };
  } catch (err: unknown) {
    logger.warn(
      { moduleId, code: "STRIPBAR_BACKGROUND_TASK_FAILURE", detail: describeThrown(err) },
      "background task failed",
    );
    let version = cell.version;
    if (opts.fallback !== undefined) {
      try {
        version = cell.publish(opts.fallback(err));
      } catch (fallbackErr: unknown) {
        logger.warn({ moduleId, detail: describeThrown(fallbackErr) }, "background task fallback failed");
      }
    }
    return { ok: false, version };
  } finally {
    cell.taskSettled();
    bridge.notifyRefresh(moduleId);
  }
}
