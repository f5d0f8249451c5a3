/**
 * packages/core/src/interaction/controller.ts — Pointer state machine.
 *
 *   idle ──down on M──▶ armed ──|dx| > threshold──▶ dragging
 *     ▲                  │                               │
 *     └──── up: click ───┘◀──── up: commit reorder ──────┘
 *
 * Only a primary-button drag that started in Left or Right commits a reorder
 * and draws a preview. Any other drag ends without a click and without a
 * reorder.
 * Capture loss from any state returns to idle without touching the order.
 * The controller never mutates configuration: a completed reorder leaves as
 * a ReorderCommit through the host callback.
 */

import type { BarConfig } from "../config/types.js";
import { describeThrown } from "../errors.js";
import type { ModuleCommand, PointerButton, ReorderCommit, ReorderableSection } from "../events.js";
import { hitTest } from "../layout/hitTest.js";
import { type BoundsMap, EMPTY_RECT } from "../layout/types.js";
import type { BarLogger } from "../logger.js";
import type { ModuleRegistry } from "../modules/registry.js";
import type { ModuleActionContext } from "../modules/types.js";
import { type DragPreview, type DragState, type InteractionPhase, dragPreviewOf, phaseOf } from "./dragState.js";
import { computeInsertionIndex, planReorder, visualOrder } from "./reorder.js";

export type InteractionHost = Readonly<{
  registry: ModuleRegistry;
  logger: BarLogger;
  bounds: () => BoundsMap;
  config: () => BarConfig;
  requestRedraw: () => void;
  emitReorder: (commit: ReorderCommit) => void;
  requestCommand: (command: ModuleCommand) => void;
}>;

function reorderable(section: string): section is ReorderableSection {
  return section === "left" || section === "right";
}

export class InteractionController {
  private readonly host: InteractionHost;
  private drag: DragState | null = null;
  private hovered: string | null = null;

  constructor(host: InteractionHost) {
    this.host = host;
  }

  get phase(): InteractionPhase {
    return phaseOf(this.drag);
  }

  get dragState(): DragState | null {
    return this.drag;
  }

  get hoverId(): string | null {
    return this.hovered;
  }

  /** Id of the module held down but not yet dragged. */
  get pressedId(): string | null {
    return this.drag !== null && !this.drag.dragging ? this.drag.clickedId : null;
  }

  dragPreview(): DragPreview | null {
    return dragPreviewOf(this.drag);
  }

  pointerDown(x: number, y: number, button: PointerButton): void {
    if (this.drag !== null) {
      this.host.logger.debug({ clickedId: this.drag.clickedId }, "pointer down during a live gesture; resetting");
      this.reset();
    }
    const id = hitTest(this.host.bounds(), x, y);
    if (id === null) return;

    const placement = this.host.registry.placementOf(id);
    const section = placement !== null && reorderable(placement.section) ? placement.section : null;
    this.drag = Object.freeze({
      clickedId: id,
      clickedPos: Object.freeze({ x, y }),
      button,
      dragging: false,
      dragStartX: x,
      dragCurrentX: x,
      originSection: section,
      originIndex: section !== null && placement !== null ? placement.index : null,
    });
    this.host.requestRedraw();
  }

  pointerMove(x: number, y: number): void {
    const drag = this.drag;
    if (drag === null) {
      this.updateHover(hitTest(this.host.bounds(), x, y));
      return;
    }

    if (drag.dragging) {
      if (!this.dragStillValid(drag)) return;
      if (drag.dragCurrentX !== x) {
        this.drag = Object.freeze({ ...drag, dragCurrentX: x });
        this.host.requestRedraw();
      }
      return;
    }

    const threshold = this.host.config().layout.dragThreshold;
    if (Math.abs(x - drag.clickedPos.x) > threshold) {
      if (!this.dragStillValid(drag)) return;
      this.drag = Object.freeze({ ...drag, dragging: true, dragStartX: drag.clickedPos.x, dragCurrentX: x });
      this.hovered = null;
      this.host.requestRedraw();
    }
  }

  pointerUp(x: number, _y: number, button: PointerButton): void {
    const drag = this.drag;
    if (drag === null || drag.button !== button) return;
    this.drag = null;

    if (drag.dragging) {
      this.commit(drag, x);
    } else {
      this.click(drag.clickedId, button);
    }
    this.host.requestRedraw();
  }

  pointerLeave(): void {
    this.updateHover(null);
  }

  captureLost(): void {
    if (this.drag === null) return;
    this.host.logger.debug({ clickedId: this.drag.clickedId }, "pointer capture lost; gesture discarded");
    this.reset();
  }

  scroll(x: number, y: number, delta: number): void {
    if (this.drag !== null && this.drag.dragging) return;
    const id = hitTest(this.host.bounds(), x, y);
    if (id === null) return;
    const module = this.host.registry.get(id);
    const onScroll = module?.onScroll;
    if (module === null || onScroll === undefined) return;
    this.invoke(id, "onScroll", () => onScroll.call(module, delta, this.actionContext(id)));
  }

  /**
   * Drop a gesture that no longer matches the registry (module removed, order
   * list changed). Called by the runtime after configuration changes.
   */
  validate(): void {
    if (this.drag !== null) this.dragStillValid(this.drag);
    if (this.hovered !== null && !this.host.registry.has(this.hovered)) this.hovered = null;
  }

  reset(): void {
    if (this.drag === null) return;
    this.drag = null;
    this.host.requestRedraw();
  }

  private dragStillValid(drag: DragState): boolean {
    const registry = this.host.registry;
    let valid = registry.has(drag.clickedId);
    if (valid && drag.originSection !== null && drag.originIndex !== null) {
      valid = registry.sectionIds(drag.originSection)[drag.originIndex] === drag.clickedId;
    }
    if (!valid) {
      this.host.logger.warn({ clickedId: drag.clickedId }, "drag state inconsistent with registry; reset to idle");
      this.reset();
    }
    return valid;
  }

  private commit(drag: DragState, releaseX: number): void {
    const section = drag.originSection;
    if (drag.button !== "primary" || section === null || drag.originIndex === null) return;
    const ids = this.host.registry.sectionIds(section);
    if (ids[drag.originIndex] !== drag.clickedId) {
      this.host.logger.warn({ clickedId: drag.clickedId, section }, "origin list changed during drag; commit dropped");
      return;
    }

    const bounds = this.host.bounds();
    const visual = visualOrder(bounds, ids);
    const insertion = computeInsertionIndex(bounds, visual, releaseX);
    const plan = planReorder(ids, visual, drag.clickedId, insertion);
    if (plan === null) return;

    this.host.emitReorder(
      Object.freeze({
        section,
        moduleId: drag.clickedId,
        oldIndex: plan.oldIndex,
        newIndex: plan.newIndex,
        order: plan.order,
      }),
    );
  }

  private click(id: string, button: PointerButton): void {
    const module = this.host.registry.get(id);
    if (module === null) return;
    const ctx = this.actionContext(id);
    if (button === "primary") {
      const onClick = module.onClick;
      if (onClick) this.invoke(id, "onClick", () => onClick.call(module, ctx));
      return;
    }
    const onRightClick = module.onRightClick;
    if (onRightClick) {
      this.invoke(id, "onRightClick", () => onRightClick.call(module, ctx));
    } else {
      this.host.requestCommand(Object.freeze({ kind: "showMenu", moduleId: id, anchor: ctx.anchor }));
    }
  }

  private actionContext(id: string): ModuleActionContext {
    return Object.freeze({
      config: this.host.config(),
      anchor: this.host.bounds().get(id) ?? EMPTY_RECT,
      requestCommand: this.host.requestCommand,
    });
  }

  private invoke(id: string, hook: string, fn: () => void): void {
    try {
      fn();
    } catch (err: unknown) {
      this.host.logger.warn(
        { moduleId: id, hook, code: "STRIPBAR_MODULE_FAILURE", detail: describeThrown(err) },
        "module handler failed",
      );
    }
    this.host.requestRedraw();
  }

  private updateHover(id: string | null): void {
    if (id === this.hovered) return;
    this.hovered = id;
    this.host.requestRedraw();
  }
}
