/**
 * packages/core/src/layout/node.ts — Layout nodes and positioned layout views.
 *
 * Why: A LayoutNode is the cached geometry result of laying out a widget. It
 * is frozen and its identity is meaningful: caches hand back the same node
 * object until they are invalidated.
 *
 * A Layout is a read-only view over a node plus an accumulated offset, so a
 * cached node can be positioned at a caller's own layout position without
 * copying the tree.
 */

import {
  type Point,
  type Rect,
  type Size,
  type Vector,
  ZERO_VECTOR,
  addVectors,
  rectPosition,
  translateRect,
} from "./types.js";

/** Geometry result mirroring the widget structure. Bounds are parent-relative. */
export type LayoutNode = Readonly<{
  bounds: Rect;
  children: readonly LayoutNode[];
}>;

/** Positioned view over a layout node. */
export type Layout = Readonly<{
  node: LayoutNode;
  offset: Vector;
}>;

const NO_CHILDREN: readonly LayoutNode[] = Object.freeze([]);

export function createLayoutNode(size: Size, children?: readonly LayoutNode[]): LayoutNode {
  return Object.freeze({
    bounds: Object.freeze({ x: 0, y: 0, w: size.w, h: size.h }),
    children: children && children.length > 0 ? Object.freeze([...children]) : NO_CHILDREN,
  });
}

export function moveLayoutNode(node: LayoutNode, to: Point): LayoutNode {
  return Object.freeze({
    bounds: Object.freeze({ x: to.x, y: to.y, w: node.bounds.w, h: node.bounds.h }),
    children: node.children,
  });
}

export function createLayout(node: LayoutNode, offset: Vector = ZERO_VECTOR): Layout {
  return Object.freeze({ node, offset });
}

/** Absolute bounds of the viewed node. */
export function layoutBounds(layout: Layout): Rect {
  return translateRect(layout.node.bounds, layout.offset);
}

export function layoutPosition(layout: Layout): Point {
  return rectPosition(layoutBounds(layout));
}

/** Child views, positioned relative to this node's absolute position. */
export function layoutChildren(layout: Layout): readonly Layout[] {
  const children = layout.node.children;
  if (children.length === 0) return [];
  const childOffset = addVectors(layout.offset, layout.node.bounds);
  const out: Layout[] = [];
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (!child) continue;
    out.push(createLayout(child, childOffset));
  }
  return out;
}

/** Bridging view: a cached node positioned at another layout's position. */
export function layoutWithOffset(node: LayoutNode, at: Point): Layout {
  return createLayout(node, at);
}
