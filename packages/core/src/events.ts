/**
 * Event types for the bar runtime.
 *
 * Inbound events are delivered serially by the host (window system, timers)
 * or by the async bridge. Outbound events leave the core through the
 * runtime's listener callbacks.
 */

import type { BarConfig } from "./config/types.js";
import type { Rect } from "./layout/types.js";

export type PointerButton = "primary" | "secondary";

// =============================================================================
// Inbound
// =============================================================================

export type BarEvent =
  | Readonly<{ kind: "pointerDown"; x: number; y: number; button: PointerButton }>
  | Readonly<{ kind: "pointerMove"; x: number; y: number }>
  | Readonly<{ kind: "pointerUp"; x: number; y: number; button: PointerButton }>
  | Readonly<{
      /** Pointer left the bar window. Clears hover, never cancels a drag. */
      kind: "pointerLeave";
    }>
  | Readonly<{
      /** Pointer capture was lost (window deactivated). Cancels any drag. */
      kind: "captureLost";
    }>
  | Readonly<{ kind: "scroll"; x: number; y: number; delta: number }>
  | Readonly<{ kind: "paint" }>
  | Readonly<{ kind: "resize"; w: number; h: number }>
  | Readonly<{ kind: "timerTick"; timerId: string }>
  | Readonly<{
      /** Posted by the async bridge after a background task published new state. */
      kind: "refresh";
      moduleId: string;
    }>
  | Readonly<{ kind: "configChanged"; config: BarConfig }>;

export type BarEventKind = BarEvent["kind"];

// =============================================================================
// Outbound
// =============================================================================

export type ReorderableSection = "left" | "right";

/**
 * A completed drag that changed a section's order.
 *
 * Indices refer to the resolved section list; `order` is the full list after
 * the move. Consumed by the configuration store.
 */
export type ReorderCommit = Readonly<{
  section: ReorderableSection;
  moduleId: string;
  oldIndex: number;
  newIndex: number;
  order: readonly string[];
}>;

/** Requests raised by module handlers for services outside the core. */
export type ModuleCommand =
  | Readonly<{ kind: "openUrl"; url: string }>
  | Readonly<{ kind: "showMenu"; moduleId: string; anchor: Rect }>
  | Readonly<{ kind: "runCommand"; command: string; args: readonly string[] }>;
