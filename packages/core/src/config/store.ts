/**
 * packages/core/src/config/store.ts — In-memory configuration service.
 *
 * The runtime never writes configuration: it emits ReorderCommit events and
 * the store turns them into a new snapshot, notifying subscribers. Disk
 * persistence is the host's business; it subscribes like anyone else.
 */

import type { ReorderCommit } from "../events.js";
import { resolveBarConfig } from "./resolve.js";
import type { BarConfig, BarConfigInput } from "./types.js";

export type ConfigListener = (next: BarConfig, prev: BarConfig) => void;

export interface ConfigStore {
  snapshot(): BarConfig;
  /** Merge a partial input over the current snapshot. Throws on invalid values. */
  update(input: BarConfigInput): BarConfig;
  /**
   * Apply a reorder commit. Returns false (and changes nothing) when the
   * commit is stale, i.e. its order is not a permutation of the current list.
   */
  applyReorder(commit: ReorderCommit): boolean;
  subscribe(listener: ConfigListener): () => void;
}

function isPermutation(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const counts = new Map<string, number>();
  for (const id of a) counts.set(id, (counts.get(id) ?? 0) + 1);
  for (const id of b) {
    const n = counts.get(id);
    if (n === undefined || n === 0) return false;
    counts.set(id, n - 1);
  }
  return true;
}

export function createConfigStore(initial: BarConfig): ConfigStore {
  let current = initial;
  const listeners = new Set<ConfigListener>();

  const publish = (next: BarConfig): void => {
    const prev = current;
    current = next;
    for (const listener of [...listeners]) listener(next, prev);
  };

  return {
    snapshot: () => current,
    update(input) {
      const next = resolveBarConfig(input, current);
      if (next !== current) publish(next);
      return next;
    },
    applyReorder(commit) {
      const list = current.sections[commit.section];
      // Ids dropped by section resolution (centered clock, duplicates, later
      // repeats of an id) are not in the commit; they keep their slots and the
      // committed ids fill the first-occurrence slots.
      const seen = new Set<string>();
      const slots = list.map((id) => {
        if (seen.has(id) || !commit.order.includes(id)) return false;
        seen.add(id);
        return true;
      });
      const kept = list.filter((_, i) => slots[i] === true);
      if (!isPermutation(kept, commit.order)) return false;
      let next = 0;
      const merged = list.map((id, i) => (slots[i] === true ? (commit.order[next++] ?? id) : id));
      const sections = commit.section === "left" ? { left: merged } : { right: merged };
      publish(resolveBarConfig({ sections }, current));
      return true;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
