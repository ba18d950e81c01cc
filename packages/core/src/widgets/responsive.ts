/**
 * packages/core/src/widgets/responsive.ts — Size-aware widget with cached content.
 *
 * Why: Some content can only be described once the space it gets is known
 * (switch from a row to a column under 60 cells, drop a sidebar, ...). A
 * responsive widget always fills its parent, and builds its content lazily
 * from a `view(size)` callback once the bounds of a call are known.
 *
 * Content cache:
 *   - The built subtree, the size it was built for and its layout are cached
 *   - Rebuild iff the inner state tree was never diffed, or the size changed
 *   - Relayout iff the cached layout is absent (after a rebuild, or after a
 *     descendant raised a layout-invalidation signal during an event)
 *
 * Exclusive access:
 *   - The cached content and the inner state tree each sit in an
 *     ExclusiveCell; every call borrows both for its duration
 *   - An overlay produced by the content keeps both borrows until the frame
 *     driver disposes it. Any other access in between is a fatal
 *     PLYUI_BORROW_CONFLICT
 */

import { throwCode } from "../errors.js";
import type { Cursor, EventStatus, MouseInteraction, UiEvent } from "../events.js";
import { type Limits, createLimits, limitsMax } from "../layout/limits.js";
import {
  type Layout,
  type LayoutNode,
  createLayoutNode,
  layoutBounds,
  layoutPosition,
  layoutWithOffset,
} from "../layout/node.js";
import {
  FILL,
  type Point,
  type Rect,
  type Size,
  type SizePreference,
  type Vector,
  ZERO_SIZE,
  rectSize,
  sizeEquals,
} from "../layout/types.js";
import { createNestedOverlay } from "../overlay/nested.js";
import type { Renderer } from "../renderer/types.js";
import {
  type DevWarner,
  type DevWarningOptions,
  createDevWarner,
} from "../runtime/devWarnings.js";
import {
  type BorrowGuard,
  type ExclusiveCell,
  createExclusiveCell,
  withExclusive,
} from "../runtime/exclusiveCell.js";
import { type Shell, createShell, identity } from "../runtime/shell.js";
import {
  type StateTree,
  defineStateTag,
  diffStateTree,
  emptyStateTree,
} from "../runtime/stateTree.js";
import { space } from "./space.js";
import type {
  A11yTree,
  DndDestinationRectangles,
  Operation,
  Overlay,
  Widget,
  WidgetId,
} from "./types.js";
import {
  disposeOverlay,
  overlayIsOver,
  overlayMouseInteraction,
  overlayOnEvent,
  overlayOperate,
  setWidgetId,
  widgetA11yNodes,
  widgetDragDestinations,
  widgetId,
  widgetMouseInteraction,
  widgetOnEvent,
  widgetOperate,
  widgetOverlay,
} from "./widget.js";

/** Builds the content for the size the widget was given. */
export type ResponsiveView<M> = (size: Size) => Widget<M>;

export type ResponsiveOptions = DevWarningOptions;

// =============================================================================
// Content cache
// =============================================================================

export type CachedContent<M> = {
  /** Size `subtree` was built for. */
  targetSize: Size;
  /** Layout of `subtree` within `targetSize`; null means "recompute". */
  layout: LayoutNode | null;
  subtree: Widget<M>;
  /** Id assigned from above; re-applied to every rebuilt subtree. */
  assignedId: WidgetId | null;
};

export function createCachedContent<M>(): CachedContent<M> {
  return { targetSize: ZERO_SIZE, layout: null, subtree: space<M>(0, 0), assignedId: null };
}

/**
 * Rebuild the subtree if needed. Returns true when `view` was called.
 */
export function updateContent<M>(
  content: CachedContent<M>,
  tree: StateTree,
  size: Size,
  view: ResponsiveView<M>,
): boolean {
  if (tree.initialized && sizeEquals(content.targetSize, size)) return false;

  const subtree = view(size);
  if (content.assignedId !== null) setWidgetId(subtree, content.assignedId);
  content.subtree = subtree;
  content.targetSize = size;
  content.layout = null;
  diffStateTree(tree, subtree);
  return true;
}

/** Lay the subtree out within `targetSize` unless a layout is cached. */
export function layoutContent<M>(
  content: CachedContent<M>,
  tree: StateTree,
  warner?: DevWarner,
): LayoutNode {
  if (content.layout !== null) return content.layout;
  const size = content.targetSize;
  const node = content.subtree.layout(tree, createLimits(ZERO_SIZE, size));
  if (warner && (node.bounds.w > size.w || node.bounds.h > size.h)) {
    warner.warnOnce(
      "responsive",
      `overflow:${content.subtree.kind}`,
      `content <${content.subtree.kind}> laid out at ${node.bounds.w}x${node.bounds.h}, ` +
        `larger than the ${size.w}x${size.h} it was built for`,
    );
  }
  content.layout = node;
  return node;
}

/**
 * Make the cache valid for `layout`'s size and return the content layout
 * positioned at `layout`'s position.
 */
export function resolveContent<M>(
  content: CachedContent<M>,
  tree: StateTree,
  layout: Layout,
  view: ResponsiveView<M>,
  warner?: DevWarner,
): Layout {
  updateContent(content, tree, rectSize(layoutBounds(layout)), view);
  return layoutWithOffset(layoutContent(content, tree, warner), layoutPosition(layout));
}

// =============================================================================
// Widget state
// =============================================================================

export type ResponsiveState = {
  /** State tree of the built content. Starts pristine. */
  tree: ExclusiveCell<StateTree>;
};

export const RESPONSIVE_STATE = defineStateTag<ResponsiveState>("responsive", () => ({
  tree: createExclusiveCell(emptyStateTree(), "responsive.tree"),
}));

// =============================================================================
// Overlay bundle
// =============================================================================

/** Back-reference to the cached layout, so an overlay event can invalidate it. */
type LayoutSlot = Readonly<{ clear: () => void }>;

type OverlayBundle<M> = Readonly<{
  /** Reenterable handle to the nested overlay; borrowed per call. */
  nested: ExclusiveCell<Overlay<M>>;
  layoutSlot: LayoutSlot;
  /** Dispose the nested overlay and give both borrows back. */
  release: () => void;
}>;

function openOverlayBundle<M>(
  contentCell: ExclusiveCell<CachedContent<M>>,
  treeCell: ExclusiveCell<StateTree>,
  view: ResponsiveView<M>,
  layout: Layout,
  translation: Vector,
  warner: DevWarner,
): OverlayBundle<M> | null {
  const guards: BorrowGuard<unknown>[] = [];
  const releaseGuards = (): void => {
    for (let i = guards.length - 1; i >= 0; i--) guards[i]?.release();
  };

  try {
    const content = contentCell.borrow("overlay");
    guards.push(content);
    const tree = treeCell.borrow("overlay");
    guards.push(tree);

    const contentLayout = resolveContent(content.value, tree.value, layout, view, warner);
    const produced = widgetOverlay(content.value.subtree, tree.value, contentLayout, translation);
    if (produced === null) {
      releaseGuards();
      return null;
    }

    const nested = createExclusiveCell(createNestedOverlay(produced), "responsive.overlay");
    let released = false;
    return Object.freeze({
      nested,
      layoutSlot: Object.freeze({
        clear(): void {
          content.value.layout = null;
        },
      }),
      release(): void {
        if (released) return;
        released = true;
        try {
          disposeOverlay(nested.peek());
        } finally {
          releaseGuards();
        }
      },
    });
  } catch (error) {
    releaseGuards();
    throw error;
  }
}

function responsiveOverlay<M>(bundle: OverlayBundle<M>): Overlay<M> {
  let disposed = false;

  function withNested<R>(owner: string, fn: (nested: Overlay<M>) => R): R {
    if (disposed) {
      throwCode("PLYUI_USE_AFTER_RELEASE", `responsive overlay used after dispose (${owner})`);
    }
    return withExclusive(bundle.nested, owner, fn);
  }

  const overlay: Overlay<M> = {
    layout(bounds: Size): LayoutNode {
      return withNested("overlay.layout", (nested) => nested.layout(bounds));
    },
    draw(renderer: Renderer, layout: Layout, cursor: Cursor): void {
      withNested("overlay.draw", (nested) => nested.draw(renderer, layout, cursor));
    },
    onEvent(event: UiEvent, layout: Layout, cursor: Cursor, shell: Shell<M>): EventStatus {
      const local = createShell<M>();
      const status = withNested("overlay.onEvent", (nested) =>
        overlayOnEvent(nested, event, layout, cursor, local),
      );
      if (local.isLayoutInvalid()) bundle.layoutSlot.clear();
      shell.merge(local, identity);
      return status;
    },
    mouseInteraction(layout: Layout, cursor: Cursor, viewport: Rect): MouseInteraction {
      return withNested("overlay.mouseInteraction", (nested) =>
        overlayMouseInteraction(nested, layout, cursor, viewport),
      );
    },
    isOver(layout: Layout, point: Point): boolean {
      return withNested("overlay.isOver", (nested) => overlayIsOver(nested, layout, point));
    },
    operate(layout: Layout, operation: Operation): void {
      withNested("overlay.operate", (nested) => overlayOperate(nested, layout, operation));
    },
    overlay(): Overlay<M> | null {
      // The nested chain is already flattened into `bundle.nested`.
      return null;
    },
    dispose(): void {
      if (disposed) return;
      disposed = true;
      bundle.release();
    },
  };
  return overlay;
}

// =============================================================================
// Widget
// =============================================================================

/**
 * A widget that fills the space its parent offers and builds its content
 * from `view` once that space is known.
 */
export function responsive<M>(view: ResponsiveView<M>, options: ResponsiveOptions = {}): Widget<M> {
  const content = createExclusiveCell(createCachedContent<M>(), "responsive.content");
  const warner = createDevWarner(options);

  /** Dispatch bridge: borrow, resolve against `layout`, forward. */
  function dispatch<R>(
    owner: string,
    tree: StateTree,
    layout: Layout,
    fn: (cached: CachedContent<M>, inner: StateTree, contentLayout: Layout) => R,
  ): R {
    const state = RESPONSIVE_STATE.get(tree);
    return withExclusive(content, owner, (cached) =>
      withExclusive(state.tree, owner, (inner) =>
        fn(cached, inner, resolveContent(cached, inner, layout, view, warner)),
      ),
    );
  }

  const widget: Widget<M> = {
    kind: "responsive",
    tag: () => RESPONSIVE_STATE,
    size(): SizePreference {
      return FILL;
    },
    layout(_tree: StateTree, limits: Limits): LayoutNode {
      return createLayoutNode(limitsMax(limits));
    },
    operate(tree: StateTree, layout: Layout, operation: Operation): void {
      dispatch("operate", tree, layout, (cached, inner, contentLayout) => {
        widgetOperate(cached.subtree, inner, contentLayout, operation);
      });
    },
    onEvent(
      tree: StateTree,
      event: UiEvent,
      layout: Layout,
      cursor: Cursor,
      shell: Shell<M>,
      viewport: Rect,
    ): EventStatus {
      const local = createShell<M>();
      const status = dispatch("onEvent", tree, layout, (cached, inner, contentLayout) => {
        const result = widgetOnEvent(
          cached.subtree,
          inner,
          event,
          contentLayout,
          cursor,
          local,
          viewport,
        );
        // A descendant changed its size requirements: relayout, keep the subtree.
        if (local.isLayoutInvalid()) cached.layout = null;
        return result;
      });
      shell.merge(local, identity);
      return status;
    },
    draw(
      tree: StateTree,
      renderer: Renderer,
      layout: Layout,
      cursor: Cursor,
      viewport: Rect,
    ): void {
      dispatch("draw", tree, layout, (cached, inner, contentLayout) => {
        cached.subtree.draw(inner, renderer, contentLayout, cursor, viewport);
      });
    },
    mouseInteraction(
      tree: StateTree,
      layout: Layout,
      cursor: Cursor,
      viewport: Rect,
    ): MouseInteraction {
      return dispatch("mouseInteraction", tree, layout, (cached, inner, contentLayout) =>
        widgetMouseInteraction(cached.subtree, inner, contentLayout, cursor, viewport),
      );
    },
    overlay(tree: StateTree, layout: Layout, translation: Vector): Overlay<M> | null {
      const state = RESPONSIVE_STATE.get(tree);
      const bundle = openOverlayBundle(content, state.tree, view, layout, translation, warner);
      return bundle === null ? null : responsiveOverlay(bundle);
    },
    a11yNodes(tree: StateTree, layout: Layout, cursor: Cursor): A11yTree {
      return dispatch("a11yNodes", tree, layout, (cached, inner, contentLayout) =>
        widgetA11yNodes(cached.subtree, inner, contentLayout, cursor),
      );
    },
    dragDestinations(tree: StateTree, layout: Layout, rectangles: DndDestinationRectangles): void {
      dispatch("dragDestinations", tree, layout, (cached, inner, contentLayout) => {
        widgetDragDestinations(cached.subtree, inner, contentLayout, rectangles);
      });
    },
    id(): WidgetId | null {
      return widgetId(content.peek().subtree);
    },
    setId(id: WidgetId): void {
      withExclusive(content, "setId", (cached) => {
        cached.assignedId = id;
        setWidgetId(cached.subtree, id);
      });
    },
  };
  return widget;
}
