/**
 * packages/core/src/widgets/types.ts — Widget and overlay capability contracts.
 *
 * Why: Built content is a heterogeneous tree selected at runtime (a builder
 * function decides which widgets to return). Every variant implements the
 * same capability set and is always invoked through it; there is no base
 * class. Optional members have defaults supplied by the call helpers in
 * ./widget.ts.
 *
 * Widgets are immutable descriptions. Everything that must survive a rebuild
 * (pressed flags, open state, nested caches) lives in the runtime StateTree
 * handed to every call.
 */

import type { Cursor, EventStatus, MouseInteraction, UiEvent } from "../events.js";
import type { Limits } from "../layout/limits.js";
import type { Layout, LayoutNode } from "../layout/node.js";
import type { Point, Rect, Size, SizePreference, Vector } from "../layout/types.js";
import type { Renderer } from "../renderer/types.js";
import type { Shell } from "../runtime/shell.js";
import type { AnyStateTag, StateTree } from "../runtime/stateTree.js";

export type WidgetId = string;

// =============================================================================
// Operations
// =============================================================================

/**
 * Cross-cutting traversal over the widget tree (focus changes, id lookups).
 * Containers call `container` and let the operation decide whether to descend.
 */
export interface Operation {
  container(id: WidgetId | null, bounds: Rect, operateOnChildren: (op: Operation) => void): void;
  focusable?(id: WidgetId | null, bounds: Rect, state: FocusableState): void;
  custom?(id: WidgetId | null, bounds: Rect, state: unknown): void;
}

/** Mutable focus flag exposed to focus operations. */
export type FocusableState = {
  focused: boolean;
};

// =============================================================================
// Accessibility and drag-and-drop
// =============================================================================

export type A11yRole = "button" | "text" | "group" | "dialog" | "unknown";

export type A11yNode = Readonly<{
  id: WidgetId | null;
  role: A11yRole;
  label: string;
  bounds: Rect;
}>;

export type A11yTree = readonly A11yNode[];

export type DndDestinationRectangle = Readonly<{
  id: WidgetId;
  rect: Rect;
  mimeTypes: readonly string[];
}>;

/** Collector for drop-target rectangles, filled during a tree walk. */
export type DndDestinationRectangles = Readonly<{
  push: (rect: DndDestinationRectangle) => void;
  list: () => readonly DndDestinationRectangle[];
}>;

// =============================================================================
// Widget
// =============================================================================

export interface Widget<M> {
  /** Human-readable variant name (diagnostics only). */
  readonly kind: string;

  /** State identity; null for stateless widgets. */
  tag?(): AnyStateTag | null;
  /** Child widgets whose state lives in the child nodes of this widget's tree. */
  children?(): readonly Widget<M>[];
  /** Reconcile `tree` (same tag as this widget) against this widget. */
  diff?(tree: StateTree): void;

  size(): SizePreference;
  layout(tree: StateTree, limits: Limits): LayoutNode;
  draw(tree: StateTree, renderer: Renderer, layout: Layout, cursor: Cursor, viewport: Rect): void;

  onEvent?(
    tree: StateTree,
    event: UiEvent,
    layout: Layout,
    cursor: Cursor,
    shell: Shell<M>,
    viewport: Rect,
  ): EventStatus;
  mouseInteraction?(
    tree: StateTree,
    layout: Layout,
    cursor: Cursor,
    viewport: Rect,
  ): MouseInteraction;
  operate?(tree: StateTree, layout: Layout, operation: Operation): void;
  overlay?(tree: StateTree, layout: Layout, translation: Vector): Overlay<M> | null;
  a11yNodes?(tree: StateTree, layout: Layout, cursor: Cursor): A11yTree;
  dragDestinations?(tree: StateTree, layout: Layout, rectangles: DndDestinationRectangles): void;

  id?(): WidgetId | null;
  setId?(id: WidgetId): void;
}

// =============================================================================
// Overlay
// =============================================================================

/**
 * Frame-scoped layer drawn above regular content (menus, popovers, tooltips).
 *
 * An overlay may hold exclusive access to state owned by the widget that
 * produced it. The frame driver calls `dispose` when the query that produced
 * it ends; afterwards the overlay must not be used.
 */
export interface Overlay<M> {
  /** Layout within the whole window `bounds`. */
  layout(bounds: Size): LayoutNode;
  draw(renderer: Renderer, layout: Layout, cursor: Cursor): void;

  onEvent?(event: UiEvent, layout: Layout, cursor: Cursor, shell: Shell<M>): EventStatus;
  mouseInteraction?(layout: Layout, cursor: Cursor, viewport: Rect): MouseInteraction;
  /** Default: the point is inside the overlay's layout bounds. */
  isOver?(layout: Layout, point: Point): boolean;
  operate?(layout: Layout, operation: Operation): void;
  /** A further overlay produced by this overlay's content. */
  overlay?(layout: Layout): Overlay<M> | null;
  /** Release frame-scoped resources. Idempotent. */
  dispose?(): void;
}
