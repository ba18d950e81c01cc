/**
 * packages/core/src/overlay/nested.ts — Flattens an overlay and the overlays it produces.
 *
 * Why: Overlay content can itself produce overlays (a submenu inside a menu).
 * The frame driver and overlay bundles only ever talk to one overlay, so this
 * wrapper walks the chain on every call.
 *
 * Layout shape: a wrapper node whose first child is the overlay's own layout
 * and whose second child, if present, is the nested overlay's wrapper node.
 *
 * Further overlays are never stored: each step asks the parent overlay for
 * its nested overlay again, uses it, and disposes it before the parent itself
 * is called, so borrows taken by the nested overlay never overlap a call into
 * the content that produced it.
 *
 * Event order: the deepest overlay sees an event first. A shallower overlay
 * only sees it when everything above ignored it, and with an unavailable
 * cursor when the pointer is over a deeper overlay.
 */

import {
  CURSOR_UNAVAILABLE,
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
} from "../events.js";
import {
  type Layout,
  type LayoutNode,
  createLayout,
  createLayoutNode,
  layoutChildren,
} from "../layout/node.js";
import type { Point, Rect, Size } from "../layout/types.js";
import type { Renderer } from "../renderer/types.js";
import type { Shell } from "../runtime/shell.js";
import type { Operation, Overlay } from "../widgets/types.js";
import {
  disposeOverlay,
  overlayIsOver,
  overlayIsUnderCursor,
  overlayMouseInteraction,
  overlayNested,
  overlayOnEvent,
  overlayOperate,
} from "../widgets/widget.js";

type Split = Readonly<{ own: Layout; nested: Layout | null }>;

function split(layout: Layout): Split | null {
  const [own, nested] = layoutChildren(layout);
  if (!own) return null;
  return { own, nested: nested ?? null };
}

/**
 * Derive the overlay nested under `overlay`, run `fn` with it and dispose it.
 * Returns null when there is none. The parent overlay must not be called from
 * `fn`: the derived overlay may hold borrows the parent's content needs.
 */
function withNested<M, R>(
  overlay: Overlay<M>,
  parts: Split,
  fn: (nested: Overlay<M>, nestedLayout: Layout) => R,
): R | null {
  if (!parts.nested) return null;
  const nested = overlayNested(overlay, parts.own);
  if (!nested) return null;
  try {
    return fn(nested, parts.nested);
  } finally {
    disposeOverlay(nested);
  }
}

function layoutRecursive<M>(overlay: Overlay<M>, bounds: Size): LayoutNode {
  const node = overlay.layout(bounds);
  const nested = overlayNested(overlay, createLayout(node));
  if (!nested) return createLayoutNode(node.bounds, [node]);
  try {
    return createLayoutNode(node.bounds, [node, layoutRecursive(nested, bounds)]);
  } finally {
    disposeOverlay(nested);
  }
}

function drawRecursive<M>(
  overlay: Overlay<M>,
  renderer: Renderer,
  layout: Layout,
  cursor: Cursor,
): void {
  const parts = split(layout);
  if (!parts) return;
  const coveredByNested =
    cursor.kind === "available" &&
    withNested(overlay, parts, (nested, nestedLayout) =>
      isOverRecursive(nested, nestedLayout, cursor),
    ) === true;
  overlay.draw(renderer, parts.own, coveredByNested ? CURSOR_UNAVAILABLE : cursor);
  withNested(overlay, parts, (nested, nestedLayout) => {
    drawRecursive(nested, renderer, nestedLayout, cursor);
  });
}

type EventOutcome = Readonly<{ status: EventStatus; isOver: boolean }>;

const IGNORED: EventOutcome = Object.freeze({ status: "ignored", isOver: false });

function eventRecursive<M>(
  overlay: Overlay<M>,
  event: UiEvent,
  layout: Layout,
  cursor: Cursor,
  shell: Shell<M>,
): EventOutcome {
  const parts = split(layout);
  if (!parts) return IGNORED;
  const fromNested =
    withNested(overlay, parts, (nested, nestedLayout) =>
      eventRecursive(nested, event, nestedLayout, cursor, shell),
    ) ?? IGNORED;
  if (fromNested.status === "captured") return fromNested;

  const isOver = fromNested.isOver || overlayIsUnderCursor(overlay, parts.own, cursor);
  const status = overlayOnEvent(
    overlay,
    event,
    parts.own,
    fromNested.isOver ? CURSOR_UNAVAILABLE : cursor,
    shell,
  );
  return { status, isOver };
}

function interactionRecursive<M>(
  overlay: Overlay<M>,
  layout: Layout,
  cursor: Cursor,
  viewport: Rect,
): MouseInteraction | null {
  const parts = split(layout);
  if (!parts) return null;
  const fromNested = withNested(overlay, parts, (nested, nestedLayout) =>
    interactionRecursive(nested, nestedLayout, cursor, viewport),
  );
  if (fromNested !== null) return fromNested;
  if (!overlayIsUnderCursor(overlay, parts.own, cursor)) return null;
  return overlayMouseInteraction(overlay, parts.own, cursor, viewport);
}

function isOverRecursive<M>(overlay: Overlay<M>, layout: Layout, cursor: Cursor): boolean {
  if (cursor.kind !== "available") return false;
  return isOverPointRecursive(overlay, layout, cursor.position);
}

function isOverPointRecursive<M>(overlay: Overlay<M>, layout: Layout, point: Point): boolean {
  const parts = split(layout);
  if (!parts) return false;
  if (overlayIsOver(overlay, parts.own, point)) return true;
  return (
    withNested(overlay, parts, (nested, nestedLayout) =>
      isOverPointRecursive(nested, nestedLayout, point),
    ) ?? false
  );
}

function operateRecursive<M>(overlay: Overlay<M>, layout: Layout, operation: Operation): void {
  const parts = split(layout);
  if (!parts) return;
  overlayOperate(overlay, parts.own, operation);
  withNested(overlay, parts, (nested, nestedLayout) => {
    operateRecursive(nested, nestedLayout, operation);
  });
}

/**
 * Wrap `root` so the whole chain of overlays it produces behaves as one.
 * Disposing the wrapper disposes `root`.
 */
export function createNestedOverlay<M>(root: Overlay<M>): Overlay<M> {
  const nested: Overlay<M> = {
    layout(bounds: Size): LayoutNode {
      return layoutRecursive(root, bounds);
    },
    draw(renderer: Renderer, layout: Layout, cursor: Cursor): void {
      drawRecursive(root, renderer, layout, cursor);
    },
    onEvent(event: UiEvent, layout: Layout, cursor: Cursor, shell: Shell<M>): EventStatus {
      return eventRecursive(root, event, layout, cursor, shell).status;
    },
    mouseInteraction(layout: Layout, cursor: Cursor, viewport: Rect): MouseInteraction {
      return interactionRecursive(root, layout, cursor, viewport) ?? "none";
    },
    isOver(layout: Layout, point: Point): boolean {
      return isOverPointRecursive(root, layout, point);
    },
    operate(layout: Layout, operation: Operation): void {
      operateRecursive(root, layout, operation);
    },
    overlay(): Overlay<M> | null {
      return null;
    },
    dispose(): void {
      disposeOverlay(root);
    },
  };
  return nested;
}
