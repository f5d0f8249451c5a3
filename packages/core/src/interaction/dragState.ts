import type { PointerButton, ReorderableSection } from "../events.js";
import type { Point } from "../layout/types.js";

/**
 * Pointer gesture in progress. Created on pointer-down over a module and
 * dropped on pointer-up or capture loss; at most one exists at a time.
 */
export type DragState = Readonly<{
  clickedId: string;
  clickedPos: Point;
  button: PointerButton;
  /** False while the press is still a potential click. */
  dragging: boolean;
  dragStartX: number;
  dragCurrentX: number;
  /** Null for Center modules, which can be dragged but never reordered. */
  originSection: ReorderableSection | null;
  originIndex: number | null;
}>;

export type InteractionPhase = "idle" | "armed" | "dragging";

export function phaseOf(drag: DragState | null): InteractionPhase {
  if (drag === null) return "idle";
  return drag.dragging ? "dragging" : "armed";
}

/** Rendering view of a live drag. */
export type DragPreview = Readonly<{
  moduleId: string;
  section: ReorderableSection;
  currentX: number;
}>;

export function dragPreviewOf(drag: DragState | null): DragPreview | null {
  if (drag === null || !drag.dragging || drag.button !== "primary" || drag.originSection === null) {
    return null;
  }
  return Object.freeze({
    moduleId: drag.clickedId,
    section: drag.originSection,
    currentX: drag.dragCurrentX,
  });
}
