/**
 * packages/core/src/runtime/userInterface.ts — Per-frame driver for a widget tree.
 *
 * Why: Hosts hand over a root widget, the window size and a batch of events;
 * the driver owns the ordering rules between the base layer and the overlay
 * layer so widgets never have to.
 *
 * Frame rules:
 *   - The root overlay is queried fresh for every step that needs it (each
 *     event, the draw pass, the mouse-interaction query) and disposed as soon
 *     as that step ends, so the base layer can be borrowed again afterwards
 *   - Each event goes to the overlay first; the base layer only sees events the
 *     overlay ignored, with an unavailable cursor while the pointer is over
 *     the overlay
 *   - A layout-invalidation signal relayouts the base layer before the next
 *     dispatch
 *   - Messages are collected in emission order across the whole batch
 */

import {
  CURSOR_UNAVAILABLE,
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
} from "../events.js";
import { createLimits } from "../layout/limits.js";
import { type Layout, type LayoutNode, createLayout } from "../layout/node.js";
import { type Rect, type Size, ZERO_SIZE, ZERO_VECTOR } from "../layout/types.js";
import { createNestedOverlay } from "../overlay/nested.js";
import type { Renderer } from "../renderer/types.js";
import type { Operation, Overlay, Widget } from "../widgets/types.js";
import {
  overlayIsUnderCursor,
  overlayMouseInteraction,
  overlayOnEvent,
  overlayOperate,
  widgetMouseInteraction,
  widgetOnEvent,
  widgetOperate,
  widgetOverlay,
} from "../widgets/widget.js";
import { type DevWarningOptions, createDevWarner } from "./devWarnings.js";
import { type RedrawRequest, createShell, identity } from "./shell.js";
import { type StateTree, diffStateTree, emptyStateTree } from "./stateTree.js";

export type UserInterfaceCache = Readonly<{ tree: StateTree }>;

export type UserInterfaceOptions = DevWarningOptions;

export type UpdateResult = Readonly<{
  /** "outdated" when a widget asked for the widget tree to be rebuilt. */
  state: "updated" | "outdated";
  /** One status per input event, in input order. */
  statuses: readonly EventStatus[];
  redraw: RedrawRequest | null;
}>;

export type UserInterface<M> = Readonly<{
  /** Dispatch `events`; published messages are appended to `messages`. */
  update: (events: readonly UiEvent[], cursor: Cursor, messages: M[]) => UpdateResult;
  draw: (renderer: Renderer, cursor: Cursor) => void;
  mouseInteraction: (cursor: Cursor) => MouseInteraction;
  operate: (operation: Operation) => void;
  /** Current layout of the base layer. */
  layout: () => LayoutNode;
  /** State to carry into the next frame's interface. */
  intoCache: () => UserInterfaceCache;
}>;

export function buildUserInterface<M>(
  root: Widget<M>,
  bounds: Size,
  cache?: UserInterfaceCache,
  options: UserInterfaceOptions = {},
): UserInterface<M> {
  const warner = createDevWarner(options);
  const tree = cache?.tree ?? emptyStateTree();
  diffStateTree(tree, root);

  const limits = createLimits(ZERO_SIZE, bounds);
  const viewport: Rect = Object.freeze({ x: 0, y: 0, w: bounds.w, h: bounds.h });
  let base = layoutRoot();

  function layoutRoot(): LayoutNode {
    const node = root.layout(tree, limits);
    if (node.bounds.w > bounds.w || node.bounds.h > bounds.h) {
      warner.warnOnce(
        "ui",
        `root-overflow:${root.kind}`,
        `root <${root.kind}> laid out at ${node.bounds.w}x${node.bounds.h}, ` +
          `window is ${bounds.w}x${bounds.h}`,
      );
    }
    return node;
  }

  function baseLayout(): Layout {
    return createLayout(base);
  }

  /** One overlay query: produce, lay out, use, dispose. */
  function withOverlay<R>(fn: (overlay: Overlay<M>, layout: Layout) => R): R | null {
    const produced = widgetOverlay(root, tree, baseLayout(), ZERO_VECTOR);
    if (produced === null) return null;
    const overlay = createNestedOverlay(produced);
    try {
      return fn(overlay, createLayout(overlay.layout(bounds)));
    } finally {
      overlay.dispose?.();
    }
  }

  return Object.freeze({
    update(events: readonly UiEvent[], cursor: Cursor, messages: M[]): UpdateResult {
      const frame = createShell<M>();
      const statuses: EventStatus[] = [];

      for (const event of events) {
        const shell = createShell<M>();
        let baseCursor = cursor;
        const overlayStatus =
          withOverlay((overlay, layout) => {
            if (overlayIsUnderCursor(overlay, layout, cursor)) baseCursor = CURSOR_UNAVAILABLE;
            return overlayOnEvent(overlay, event, layout, cursor, shell);
          }) ?? "ignored";

        let status = overlayStatus;
        if (overlayStatus === "ignored") {
          if (shell.isLayoutInvalid()) base = layoutRoot();
          status = widgetOnEvent(root, tree, event, baseLayout(), baseCursor, shell, viewport);
        }
        if (shell.isLayoutInvalid()) base = layoutRoot();

        frame.merge(shell, identity);
        statuses.push(status);
      }

      messages.push(...frame.messages());
      return Object.freeze({
        state: frame.areWidgetsInvalid() ? "outdated" : "updated",
        statuses: Object.freeze(statuses),
        redraw: frame.redrawRequest(),
      });
    },
    draw(renderer: Renderer, cursor: Cursor): void {
      const overOverlay =
        withOverlay((overlay, layout) => overlayIsUnderCursor(overlay, layout, cursor)) ?? false;
      root.draw(tree, renderer, baseLayout(), overOverlay ? CURSOR_UNAVAILABLE : cursor, viewport);
      withOverlay((overlay, layout) => {
        overlay.draw(renderer, layout, cursor);
      });
    },
    mouseInteraction(cursor: Cursor): MouseInteraction {
      const fromOverlay = withOverlay((overlay, layout) =>
        overlayIsUnderCursor(overlay, layout, cursor)
          ? overlayMouseInteraction(overlay, layout, cursor, viewport)
          : null,
      );
      if (fromOverlay !== null) return fromOverlay;
      return widgetMouseInteraction(root, tree, baseLayout(), cursor, viewport);
    },
    operate(operation: Operation): void {
      widgetOperate(root, tree, baseLayout(), operation);
      withOverlay((overlay, layout) => {
        overlayOperate(overlay, layout, operation);
      });
    },
    layout(): LayoutNode {
      return base;
    },
    intoCache(): UserInterfaceCache {
      return Object.freeze({ tree });
    },
  });
}
