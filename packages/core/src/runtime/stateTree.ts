/**
 * packages/core/src/runtime/stateTree.ts — Runtime state tree and its reconciliation.
 *
 * Why: Widgets are rebuilt freely; their runtime state (pressed flags, open
 * popovers, nested content caches) must survive rebuilds whenever the new
 * widget sits at the same position with the same state identity.
 *
 * Reconciliation rules:
 *   - A node keeps its state iff the new widget at that position has the same
 *     state tag (reference identity)
 *   - Children are matched by index; extra nodes are dropped, missing nodes
 *     are created fresh
 *   - A tag mismatch resets the node and its whole subtree to defaults
 *   - Every diffed node is marked initialized; a pristine node is one that has
 *     never been diffed, regardless of its shape
 */

import { throwCode } from "../errors.js";
import type { Widget } from "../widgets/types.js";

/** Untyped view of a state tag, as stored in tree nodes. */
export type AnyStateTag = Readonly<{
  name: string;
  /** Store fresh default state for `tree`. */
  init: (tree: StateTree) => void;
}>;

/** Typed state identity. Compare by reference. */
export type StateTag<S> = AnyStateTag &
  Readonly<{
    /** Read the state of a node carrying this tag. */
    get: (tree: StateTree) => S;
    set: (tree: StateTree, state: S) => void;
  }>;

export type StateTree = {
  tag: AnyStateTag | null;
  children: StateTree[];
  /** False until the node has been diffed against a widget at least once. */
  initialized: boolean;
};

export function defineStateTag<S>(name: string, create: () => S): StateTag<S> {
  // Boxed so that a state value of `undefined` is still distinguishable from "absent".
  const slots = new WeakMap<StateTree, { value: S }>();

  const tag: StateTag<S> = Object.freeze({
    name,
    init(tree: StateTree): void {
      slots.set(tree, { value: create() });
    },
    get(tree: StateTree): S {
      const slot = tree.tag === tag ? slots.get(tree) : undefined;
      if (slot === undefined) {
        throwCode(
          "PLYUI_INVALID_STATE",
          `state tree node carries tag "${tree.tag?.name ?? "stateless"}", expected "${name}"`,
        );
      }
      return slot.value;
    },
    set(tree: StateTree, state: S): void {
      if (tree.tag !== tag) {
        throwCode(
          "PLYUI_INVALID_STATE",
          `cannot store "${name}" state in a node tagged "${tree.tag?.name ?? "stateless"}"`,
        );
      }
      slots.set(tree, { value: state });
    },
  });
  return tag;
}

/** A pristine node: no tag, no children, never diffed. */
export function emptyStateTree(): StateTree {
  return { tag: null, children: [], initialized: false };
}

function widgetTag<M>(widget: Widget<M>): AnyStateTag | null {
  return widget.tag?.() ?? null;
}

function widgetChildren<M>(widget: Widget<M>): readonly Widget<M>[] {
  return widget.children?.() ?? [];
}

function populate<M>(tree: StateTree, widget: Widget<M>): void {
  const tag = widgetTag(widget);
  tree.tag = tag;
  tag?.init(tree);
  tree.children = widgetChildren(widget).map((child) => createStateTree(child));
  tree.initialized = true;
}

/** Fresh state for `widget` and all of its children. */
export function createStateTree<M>(widget: Widget<M>): StateTree {
  const tree = emptyStateTree();
  populate(tree, widget);
  return tree;
}

/** Reconcile `tree` in place against `widget`. */
export function diffStateTree<M>(tree: StateTree, widget: Widget<M>): void {
  if (tree.tag !== widgetTag(widget)) {
    populate(tree, widget);
    return;
  }
  if (widget.diff) {
    widget.diff(tree);
  } else {
    diffChildren(tree, widgetChildren(widget));
  }
  tree.initialized = true;
}

/** Index-wise reconciliation of `tree.children` against `children`. */
export function diffChildren<M>(tree: StateTree, children: readonly Widget<M>[]): void {
  if (tree.children.length > children.length) {
    tree.children.length = children.length;
  }
  for (const [i, child] of children.entries()) {
    const existing = tree.children[i];
    if (existing) {
      diffStateTree(existing, child);
    } else {
      tree.children.push(createStateTree(child));
    }
  }
}

/** Child node at `index`; a pristine node is appended when the tree has not been diffed yet. */
export function childTree(tree: StateTree, index: number): StateTree {
  const existing = tree.children[index];
  if (existing) return existing;
  const fresh = emptyStateTree();
  while (tree.children.length < index) tree.children.push(emptyStateTree());
  tree.children.push(fresh);
  return fresh;
}
