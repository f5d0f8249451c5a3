/**
 * packages/core/src/runtime/asyncBridge.ts — Background task → UI loop notifications.
 *
 * Background tasks never touch layout or drawing state. After publishing into
 * their module's state cell they call notifyRefresh(moduleId). Pending
 * notifications are coalesced per module id and handed to the loop in one
 * batch; the loop turns each into a `refresh` event.
 *
 * The queue is unbounded, but coalescing keeps it at most one entry per
 * module id.
 */

export type BridgeScheduler = (fn: () => void) => void;

export interface AsyncBridge {
  /** Callable from any task. Never throws. */
  notifyRefresh(moduleId: string): void;
  /** Take every pending notification, in first-notified order. */
  drain(): readonly string[];
  readonly pending: number;
  /**
   * Install the loop's wakeup. It runs through the scheduler, never inside
   * the notifying task's call stack, and at most once per batch.
   */
  setWakeup(wakeup: (() => void) | null): void;
}

export function createAsyncBridge(
  opts: Readonly<{ schedule?: BridgeScheduler }> = {},
): AsyncBridge {
  const schedule = opts.schedule ?? queueMicrotask;
  const pending = new Set<string>();
  let wakeup: (() => void) | null = null;
  let wakeScheduled = false;

  const scheduleWake = (): void => {
    if (wakeScheduled || wakeup === null || pending.size === 0) return;
    wakeScheduled = true;
    schedule(() => {
      wakeScheduled = false;
      if (wakeup !== null && pending.size > 0) wakeup();
    });
  };

  return {
    notifyRefresh(moduleId) {
      pending.add(moduleId);
      scheduleWake();
    },
    drain() {
      const ids = [...pending];
      pending.clear();
      return ids;
    },
    get pending() {
      return pending.size;
    },
    setWakeup(next) {
      wakeup = next;
      scheduleWake();
    },
  };
}
