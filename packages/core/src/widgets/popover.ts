/**
 * packages/core/src/widgets/popover.ts — Anchor with a floating content layer.
 *
 * Why: The canonical overlay producer. While `open`, the popover answers the
 * overlay query with its content placed right below the anchor; the content
 * may contain popovers of its own, which surface as nested overlays.
 *
 * The content's state lives in child node 1 even while closed, so reopening
 * keeps whatever the content remembered.
 */

import {
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
  cursorIsOver,
} from "../events.js";
import { type Limits, createLimits } from "../layout/limits.js";
import {
  type Layout,
  type LayoutNode,
  createLayout,
  createLayoutNode,
  layoutBounds,
  layoutChildren,
  moveLayoutNode,
} from "../layout/node.js";
import {
  type Point,
  type Rect,
  type Size,
  type SizePreference,
  type Vector,
  ZERO_SIZE,
  ZERO_VECTOR,
  size,
} from "../layout/types.js";
import { groupOverlays } from "../overlay/group.js";
import type { Renderer } from "../renderer/types.js";
import type { Shell } from "../runtime/shell.js";
import { type StateTree, childTree } from "../runtime/stateTree.js";
import type {
  A11yTree,
  DndDestinationRectangles,
  Operation,
  Overlay,
  Widget,
  WidgetId,
} from "./types.js";
import {
  mergeA11yTrees,
  widgetA11yNodes,
  widgetDragDestinations,
  widgetMouseInteraction,
  widgetOnEvent,
  widgetOperate,
  widgetOverlay,
} from "./widget.js";

export type PopoverProps<M> = Readonly<{
  id?: WidgetId;
  open: boolean;
  /** Published when a mouse press lands outside the open content. */
  onDismiss?: M;
}>;

const ANCHOR = 0;
const CONTENT = 1;

function popoverOverlay<M>(
  content: Widget<M>,
  tree: StateTree,
  position: Point,
  props: PopoverProps<M>,
): Overlay<M> {
  const overlay: Overlay<M> = {
    layout(bounds: Size): LayoutNode {
      const available = size(
        Math.max(0, bounds.w - position.x),
        Math.max(0, bounds.h - position.y),
      );
      const node = content.layout(tree, createLimits(ZERO_SIZE, available));
      return moveLayoutNode(node, position);
    },
    draw(renderer: Renderer, layout: Layout, cursor: Cursor): void {
      const bounds = layoutBounds(layout);
      renderer.withLayer(bounds, () => {
        renderer.fillRect(bounds, { bg: "popover" });
        content.draw(tree, renderer, layout, cursor, bounds);
      });
    },
    onEvent(event: UiEvent, layout: Layout, cursor: Cursor, shell: Shell<M>): EventStatus {
      const bounds = layoutBounds(layout);
      const status = widgetOnEvent(content, tree, event, layout, cursor, shell, bounds);
      if (status === "captured") return status;
      if (
        event.kind === "mouse" &&
        event.action === "down" &&
        !cursorIsOver(cursor, bounds) &&
        props.onDismiss !== undefined
      ) {
        shell.publish(props.onDismiss);
        return "captured";
      }
      return status;
    },
    mouseInteraction(layout: Layout, cursor: Cursor, viewport: Rect): MouseInteraction {
      return widgetMouseInteraction(content, tree, layout, cursor, viewport);
    },
    operate(layout: Layout, operation: Operation): void {
      widgetOperate(content, tree, layout, operation);
    },
    overlay(layout: Layout): Overlay<M> | null {
      return widgetOverlay(content, tree, layout, ZERO_VECTOR);
    },
  };
  return overlay;
}

export function popover<M>(
  anchor: Widget<M>,
  content: Widget<M>,
  props: PopoverProps<M>,
): Widget<M> {
  const items = Object.freeze([anchor, content]);
  let id: WidgetId | null = props.id ?? null;

  function anchorLayout(layout: Layout): Layout {
    return layoutChildren(layout)[0] ?? createLayout(createLayoutNode(ZERO_SIZE), layout.offset);
  }

  const widget: Widget<M> = {
    kind: "popover",
    children(): readonly Widget<M>[] {
      return items;
    },
    size(): SizePreference {
      return anchor.size();
    },
    layout(tree: StateTree, limits: Limits): LayoutNode {
      const node = anchor.layout(childTree(tree, ANCHOR), limits);
      return createLayoutNode(node.bounds, [node]);
    },
    draw(
      tree: StateTree,
      renderer: Renderer,
      layout: Layout,
      cursor: Cursor,
      viewport: Rect,
    ): void {
      anchor.draw(childTree(tree, ANCHOR), renderer, anchorLayout(layout), cursor, viewport);
    },
    onEvent(
      tree: StateTree,
      event: UiEvent,
      layout: Layout,
      cursor: Cursor,
      shell: Shell<M>,
      viewport: Rect,
    ): EventStatus {
      return widgetOnEvent(
        anchor,
        childTree(tree, ANCHOR),
        event,
        anchorLayout(layout),
        cursor,
        shell,
        viewport,
      );
    },
    mouseInteraction(
      tree: StateTree,
      layout: Layout,
      cursor: Cursor,
      viewport: Rect,
    ): MouseInteraction {
      return widgetMouseInteraction(
        anchor,
        childTree(tree, ANCHOR),
        anchorLayout(layout),
        cursor,
        viewport,
      );
    },
    operate(tree: StateTree, layout: Layout, operation: Operation): void {
      operation.container(id, layoutBounds(layout), (op) => {
        widgetOperate(anchor, childTree(tree, ANCHOR), anchorLayout(layout), op);
      });
    },
    overlay(tree: StateTree, layout: Layout, translation: Vector): Overlay<M> | null {
      const anchorOverlay = widgetOverlay(
        anchor,
        childTree(tree, ANCHOR),
        anchorLayout(layout),
        translation,
      );
      if (!props.open) return anchorOverlay;

      const bounds = layoutBounds(layout);
      const position = { x: bounds.x + translation.x, y: bounds.y + bounds.h + translation.y };
      const own = popoverOverlay(content, childTree(tree, CONTENT), position, props);
      return groupOverlays(anchorOverlay ? [anchorOverlay, own] : [own]);
    },
    a11yNodes(tree: StateTree, layout: Layout, cursor: Cursor): A11yTree {
      return mergeA11yTrees([
        widgetA11yNodes(anchor, childTree(tree, ANCHOR), anchorLayout(layout), cursor),
      ]);
    },
    dragDestinations(tree: StateTree, layout: Layout, rectangles: DndDestinationRectangles): void {
      widgetDragDestinations(anchor, childTree(tree, ANCHOR), anchorLayout(layout), rectangles);
    },
    id(): WidgetId | null {
      return id;
    },
    setId(next: WidgetId): void {
      id = next;
    },
  };
  return widget;
}
