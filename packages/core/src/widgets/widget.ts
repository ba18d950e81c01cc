/**
 * packages/core/src/widgets/widget.ts — Call helpers for optional widget capabilities.
 *
 * Why: Optional members of Widget/Overlay have fixed defaults. Containers and
 * bridges call through these helpers so each default is written once.
 */

import {
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
  cursorPosition,
} from "../events.js";
import { rectContainsPoint } from "../layout/hitTest.js";
import { type Layout, layoutBounds } from "../layout/node.js";
import type { Point, Rect, Vector } from "../layout/types.js";
import type { Shell } from "../runtime/shell.js";
import type { StateTree } from "../runtime/stateTree.js";
import type {
  A11yTree,
  DndDestinationRectangle,
  DndDestinationRectangles,
  Operation,
  Overlay,
  Widget,
  WidgetId,
} from "./types.js";

const EMPTY_A11Y_TREE: A11yTree = Object.freeze([]);

export function emptyA11yTree(): A11yTree {
  return EMPTY_A11Y_TREE;
}

export function mergeA11yTrees(trees: readonly A11yTree[]): A11yTree {
  const out = trees.flat();
  return out.length === 0 ? EMPTY_A11Y_TREE : Object.freeze(out);
}

export function createDndDestinationRectangles(): DndDestinationRectangles {
  const rects: DndDestinationRectangle[] = [];
  return Object.freeze({
    push(rect: DndDestinationRectangle): void {
      rects.push(Object.freeze({ ...rect, mimeTypes: Object.freeze([...rect.mimeTypes]) }));
    },
    list(): readonly DndDestinationRectangle[] {
      return rects;
    },
  });
}

export function widgetOnEvent<M>(
  widget: Widget<M>,
  tree: StateTree,
  event: UiEvent,
  layout: Layout,
  cursor: Cursor,
  shell: Shell<M>,
  viewport: Rect,
): EventStatus {
  return widget.onEvent?.(tree, event, layout, cursor, shell, viewport) ?? "ignored";
}

export function widgetMouseInteraction<M>(
  widget: Widget<M>,
  tree: StateTree,
  layout: Layout,
  cursor: Cursor,
  viewport: Rect,
): MouseInteraction {
  return widget.mouseInteraction?.(tree, layout, cursor, viewport) ?? "none";
}

export function widgetOperate<M>(
  widget: Widget<M>,
  tree: StateTree,
  layout: Layout,
  operation: Operation,
): void {
  widget.operate?.(tree, layout, operation);
}

export function widgetOverlay<M>(
  widget: Widget<M>,
  tree: StateTree,
  layout: Layout,
  translation: Vector,
): Overlay<M> | null {
  return widget.overlay?.(tree, layout, translation) ?? null;
}

export function widgetA11yNodes<M>(
  widget: Widget<M>,
  tree: StateTree,
  layout: Layout,
  cursor: Cursor,
): A11yTree {
  return widget.a11yNodes?.(tree, layout, cursor) ?? EMPTY_A11Y_TREE;
}

export function widgetDragDestinations<M>(
  widget: Widget<M>,
  tree: StateTree,
  layout: Layout,
  rectangles: DndDestinationRectangles,
): void {
  widget.dragDestinations?.(tree, layout, rectangles);
}

export function widgetId<M>(widget: Widget<M>): WidgetId | null {
  return widget.id?.() ?? null;
}

export function setWidgetId<M>(widget: Widget<M>, id: WidgetId): void {
  widget.setId?.(id);
}

// =============================================================================
// Overlay defaults
// =============================================================================

export function overlayOnEvent<M>(
  overlay: Overlay<M>,
  event: UiEvent,
  layout: Layout,
  cursor: Cursor,
  shell: Shell<M>,
): EventStatus {
  return overlay.onEvent?.(event, layout, cursor, shell) ?? "ignored";
}

export function overlayMouseInteraction<M>(
  overlay: Overlay<M>,
  layout: Layout,
  cursor: Cursor,
  viewport: Rect,
): MouseInteraction {
  return overlay.mouseInteraction?.(layout, cursor, viewport) ?? "none";
}

export function overlayIsOver<M>(overlay: Overlay<M>, layout: Layout, point: Point): boolean {
  if (overlay.isOver) return overlay.isOver(layout, point);
  return rectContainsPoint(layoutBounds(layout), point);
}

export function overlayIsUnderCursor<M>(overlay: Overlay<M>, layout: Layout, cursor: Cursor): boolean {
  const position = cursorPosition(cursor);
  return position !== null && overlayIsOver(overlay, layout, position);
}

export function overlayOperate<M>(overlay: Overlay<M>, layout: Layout, operation: Operation): void {
  overlay.operate?.(layout, operation);
}

export function overlayNested<M>(overlay: Overlay<M>, layout: Layout): Overlay<M> | null {
  return overlay.overlay?.(layout) ?? null;
}

export function disposeOverlay<M>(overlay: Overlay<M> | null): void {
  overlay?.dispose?.();
}
