/**
 * packages/core/src/modules/types.ts — Module capability set.
 *
 * The engine path (layout, hit testing, dispatch) only ever sees this
 * interface. Module-specific behavior is reached through
 * ModuleRegistry.queryAs at the few call sites that need it.
 */

import type { BarConfig } from "../config/types.js";
import type { ModuleCommand } from "../events.js";
import type { Rect } from "../layout/types.js";

/** Passed to input handlers. */
export type ModuleActionContext = Readonly<{
  config: BarConfig;
  /** The module's rectangle from the most recent layout pass. */
  anchor: Rect;
  /** Forward a request to a service outside the core (menus, URLs, commands). */
  requestCommand: (command: ModuleCommand) => void;
}>;

export interface BarModule {
  /** Stable unique id; also the key used in section order lists. */
  readonly id: string;
  /** Human-readable name (menus, tooltips). */
  readonly name: string;

  /** Current display text. An empty string hides the module for this frame. */
  displayText(config: BarConfig): string;

  /**
   * Refresh cached state. Called once per frame on the UI loop, so it must
   * return immediately: anything that does I/O is started as a background
   * task and only its previously published result is read here.
   */
  update(config: BarConfig): void;

  onClick?(ctx: ModuleActionContext): void;
  onRightClick?(ctx: ModuleActionContext): void;
  /** Positive delta scrolls up. */
  onScroll?(delta: number, ctx: ModuleActionContext): void;

  tooltip?(): string | null;
  isVisible?(): boolean;

  /** Fixed pixel width, overriding measurement. */
  preferredWidth?(): number | null;
  /** Widest plausible text; its measured width is reserved to avoid jitter. */
  widthSample?(config: BarConfig): string | null;

  /** Whether the text is drawn with the bold font. */
  emphasized?(): boolean;

  /** Release owned resources (timers, handles). Called once at shutdown. */
  dispose?(): void;
}

export function moduleIsVisible(module: BarModule): boolean {
  return module.isVisible ? module.isVisible() : true;
}

export function moduleTooltip(module: BarModule): string | null {
  return module.tooltip ? module.tooltip() : null;
}
