/**
 * packages/core/src/widgets/stack.ts — Row/column stacking containers.
 *
 * Why: The smallest container that exercises every forwarding path (draw,
 * events, mouse interaction, operations, overlays, a11y, drop targets) over
 * a list of children with their own state subtrees.
 *
 * Layout:
 *   - Children that do not fill the main axis are measured first, in order
 *   - Remaining main-axis space is split between "fill" children; the
 *     leftover cells go to the earliest fill children
 *   - `spacing` sits between children, `padding` around all of them
 *   - Each child is limited to the content box on the cross axis
 */

import {
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
  maxMouseInteraction,
  mergeEventStatus,
} from "../events.js";
import { type Limits, createLimits, resolveLimits } from "../layout/limits.js";
import {
  type Layout,
  type LayoutNode,
  createLayoutNode,
  layoutBounds,
  layoutChildren,
  moveLayoutNode,
} from "../layout/node.js";
import type { Axis, Length, Rect, Size, SizePreference, Vector } from "../layout/types.js";
import { size } from "../layout/types.js";
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

export type StackProps = Readonly<{
  id?: WidgetId;
  spacing?: number;
  padding?: number;
  width?: Length;
  height?: Length;
}>;

type Entry<M> = Readonly<{ widget: Widget<M>; tree: StateTree; layout: Layout }>;

function readNonNegativeInt(raw: number | undefined): number {
  if (raw === undefined || !Number.isFinite(raw)) return 0;
  const n = Math.trunc(raw);
  return n <= 0 ? 0 : n;
}

function mainOf(axis: Axis, s: Size): number {
  return axis === "column" ? s.h : s.w;
}

function crossOf(axis: Axis, s: Size): number {
  return axis === "column" ? s.w : s.h;
}

function sizeOnAxes(axis: Axis, main: number, cross: number): Size {
  return axis === "column" ? size(cross, main) : size(main, cross);
}

function mainPreference(axis: Axis, preference: SizePreference): Length {
  return axis === "column" ? preference.height : preference.width;
}

function crossPreference(axis: Axis, preference: SizePreference): Length {
  return axis === "column" ? preference.width : preference.height;
}

function derivePreference<M>(
  axis: Axis,
  children: readonly Widget<M>[],
  props: StackProps,
): SizePreference {
  const prefs = children.map((child) => child.size());
  const fillsMain = prefs.some((p) => mainPreference(axis, p) === "fill");
  const fillsCross = prefs.some((p) => crossPreference(axis, p) === "fill");
  const main: Length = fillsMain ? "fill" : "shrink";
  const cross: Length = fillsCross ? "fill" : "shrink";
  return Object.freeze({
    width: props.width ?? (axis === "column" ? cross : main),
    height: props.height ?? (axis === "column" ? main : cross),
  });
}

function stack<M>(axis: Axis, children: readonly Widget<M>[], props: StackProps): Widget<M> {
  const items = Object.freeze([...children]);
  const spacing = readNonNegativeInt(props.spacing);
  const padding = readNonNegativeInt(props.padding);
  const preference = derivePreference(axis, items, props);
  let id: WidgetId | null = props.id ?? null;

  function entries(tree: StateTree, layout: Layout): Entry<M>[] {
    const layouts = layoutChildren(layout);
    const out: Entry<M>[] = [];
    for (const [i, widget] of items.entries()) {
      const childLayout = layouts[i];
      if (!childLayout) continue;
      out.push({ widget, tree: childTree(tree, i), layout: childLayout });
    }
    return out;
  }

  const widget: Widget<M> = {
    kind: axis,
    children(): readonly Widget<M>[] {
      return items;
    },
    size(): SizePreference {
      return preference;
    },
    layout(tree: StateTree, limits: Limits): LayoutNode {
      const pad2 = padding * 2;
      const maxMain = Math.max(0, mainOf(axis, limits.max) - pad2);
      const maxCross = Math.max(0, crossOf(axis, limits.max) - pad2);
      const gaps = items.length > 1 ? spacing * (items.length - 1) : 0;

      const nodes: (LayoutNode | null)[] = items.map(() => null);
      let remaining = Math.max(0, maxMain - gaps);
      let fillCount = 0;

      for (const [i, child] of items.entries()) {
        if (mainPreference(axis, child.size()) === "fill") {
          fillCount++;
          continue;
        }
        const childLimits = createLimits(size(0, 0), sizeOnAxes(axis, remaining, maxCross));
        const node = child.layout(childTree(tree, i), childLimits);
        nodes[i] = node;
        remaining = Math.max(0, remaining - mainOf(axis, node.bounds));
      }

      if (fillCount > 0) {
        const share = Math.floor(remaining / fillCount);
        let leftover = remaining - share * fillCount;
        for (const [i, child] of items.entries()) {
          if (nodes[i] !== null) continue;
          const main = share + (leftover > 0 ? 1 : 0);
          if (leftover > 0) leftover--;
          const childLimits = createLimits(
            sizeOnAxes(axis, main, 0),
            sizeOnAxes(axis, main, maxCross),
          );
          nodes[i] = child.layout(childTree(tree, i), childLimits);
        }
      }

      const placed: LayoutNode[] = [];
      let cursorMain = padding;
      let usedCross = 0;
      for (const node of nodes) {
        if (node === null) continue;
        const at =
          axis === "column" ? { x: padding, y: cursorMain } : { x: cursorMain, y: padding };
        placed.push(moveLayoutNode(node, at));
        cursorMain += mainOf(axis, node.bounds) + spacing;
        usedCross = Math.max(usedCross, crossOf(axis, node.bounds));
      }
      const usedMain = placed.length > 0 ? cursorMain - spacing - padding : 0;
      const intrinsic = sizeOnAxes(axis, usedMain + pad2, usedCross + pad2);
      return createLayoutNode(resolveLimits(limits, preference, intrinsic), placed);
    },
    draw(
      tree: StateTree,
      renderer: Renderer,
      layout: Layout,
      cursor: Cursor,
      viewport: Rect,
    ): void {
      for (const entry of entries(tree, layout)) {
        entry.widget.draw(entry.tree, renderer, entry.layout, cursor, viewport);
      }
    },
    onEvent(
      tree: StateTree,
      event: UiEvent,
      layout: Layout,
      cursor: Cursor,
      shell: Shell<M>,
      viewport: Rect,
    ): EventStatus {
      let status: EventStatus = "ignored";
      for (const entry of entries(tree, layout)) {
        status = mergeEventStatus(
          status,
          widgetOnEvent(entry.widget, entry.tree, event, entry.layout, cursor, shell, viewport),
        );
      }
      return status;
    },
    mouseInteraction(
      tree: StateTree,
      layout: Layout,
      cursor: Cursor,
      viewport: Rect,
    ): MouseInteraction {
      let interaction: MouseInteraction = "none";
      for (const entry of entries(tree, layout)) {
        interaction = maxMouseInteraction(
          interaction,
          widgetMouseInteraction(entry.widget, entry.tree, entry.layout, cursor, viewport),
        );
      }
      return interaction;
    },
    operate(tree: StateTree, layout: Layout, operation: Operation): void {
      operation.container(id, layoutBounds(layout), (op) => {
        for (const entry of entries(tree, layout)) {
          widgetOperate(entry.widget, entry.tree, entry.layout, op);
        }
      });
    },
    overlay(tree: StateTree, layout: Layout, translation: Vector): Overlay<M> | null {
      const overlays: Overlay<M>[] = [];
      for (const entry of entries(tree, layout)) {
        const overlay = widgetOverlay(entry.widget, entry.tree, entry.layout, translation);
        if (overlay) overlays.push(overlay);
      }
      return groupOverlays(overlays);
    },
    a11yNodes(tree: StateTree, layout: Layout, cursor: Cursor): A11yTree {
      return mergeA11yTrees(
        entries(tree, layout).map((entry) =>
          widgetA11yNodes(entry.widget, entry.tree, entry.layout, cursor),
        ),
      );
    },
    dragDestinations(tree: StateTree, layout: Layout, rectangles: DndDestinationRectangles): void {
      for (const entry of entries(tree, layout)) {
        widgetDragDestinations(entry.widget, entry.tree, entry.layout, rectangles);
      }
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

export function column<M>(children: readonly Widget<M>[], props: StackProps = {}): Widget<M> {
  return stack("column", children, props);
}

export function row<M>(children: readonly Widget<M>[], props: StackProps = {}): Widget<M> {
  return stack("row", children, props);
}
