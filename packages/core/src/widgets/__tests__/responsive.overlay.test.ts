import { assert, describe, test } from "@ply-ui/testkit";
import { isPlyUiError } from "../../errors.js";
import {
  CURSOR_UNAVAILABLE,
  type Cursor,
  type UiEvent,
  cursorAt,
  keyEvent,
  mouseEvent,
} from "../../events.js";
import { type Layout, createLayout, createLayoutNode } from "../../layout/node.js";
import { type Rect, ZERO_VECTOR, size } from "../../layout/types.js";
import type { Shell } from "../../runtime/shell.js";
import { createShell } from "../../runtime/shell.js";
import { type StateTree, createStateTree } from "../../runtime/stateTree.js";
import { createRecordingRenderer } from "../../testing/renderer.js";
import { button } from "../button.js";
import { popover } from "../popover.js";
import { RESPONSIVE_STATE, responsive } from "../responsive.js";
import { column } from "../stack.js";
import { text } from "../text.js";
import type { Widget } from "../types.js";

const VIEWPORT: Rect = { x: 0, y: 0, w: 40, h: 10 };
const FRAME: Layout = createLayout(createLayoutNode(size(40, 10)));

function menu(content: Widget<string> = column([button("Item", { onPress: "pick" })])) {
  return popover(button<string>("Menu", { onPress: "toggle" }), content, {
    open: true,
    onDismiss: "dismiss",
  });
}

function mount(widget: Widget<string>) {
  return { widget, tree: createStateTree(widget) };
}

function isConflict(error: unknown): boolean {
  return isPlyUiError(error, "PLYUI_BORROW_CONFLICT");
}

describe("responsive overlay", () => {
  test("content without an overlay produces none and holds nothing", () => {
    const { widget, tree } = mount(responsive(() => text<string>("plain")));

    assert.equal(widget.overlay?.(tree, FRAME, ZERO_VECTOR), null);
    assert.equal(RESPONSIVE_STATE.get(tree).tree.isBorrowed(), false);
    const renderer = createRecordingRenderer();
    widget.draw(tree, renderer, FRAME, CURSOR_UNAVAILABLE, VIEWPORT);
    assert.deepEqual(renderer.texts(), ["0,0:plain"]);
  });

  test("an active overlay holds the content until disposed", () => {
    const { widget, tree } = mount(responsive(() => menu()));
    const overlay = widget.overlay?.(tree, FRAME, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;

    assert.throws(
      () => widget.draw(tree, createRecordingRenderer(), FRAME, CURSOR_UNAVAILABLE, VIEWPORT),
      (error: unknown) =>
        isConflict(error) &&
        error instanceof Error &&
        error.message ===
          'responsive.content: "draw" requested exclusive access while "overlay" holds it',
    );
    assert.throws(() => widget.overlay?.(tree, FRAME, ZERO_VECTOR), isConflict);
    assert.equal(RESPONSIVE_STATE.get(tree).tree.holder(), "overlay");

    overlay.dispose?.();
    assert.equal(RESPONSIVE_STATE.get(tree).tree.isBorrowed(), false);
    const renderer = createRecordingRenderer();
    widget.draw(tree, renderer, FRAME, CURSOR_UNAVAILABLE, VIEWPORT);
    assert.deepEqual(renderer.texts(), ["0,0:[ Menu ]"]);
  });

  test("dispose is idempotent and later use fails", () => {
    const { widget, tree } = mount(responsive(() => menu()));
    const overlay = widget.overlay?.(tree, FRAME, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;

    overlay.dispose?.();
    overlay.dispose?.();
    assert.throws(
      () => overlay.layout(size(40, 10)),
      (error: unknown) => isPlyUiError(error, "PLYUI_USE_AFTER_RELEASE"),
    );
  });

  test("lays out and draws the content's overlay", () => {
    const { widget, tree } = mount(responsive(() => menu()));
    const overlay = widget.overlay?.(tree, FRAME, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;

    try {
      const node = overlay.layout(size(40, 10));
      assert.deepEqual(node.bounds, { x: 0, y: 0, w: 8, h: 1 });
      assert.deepEqual(node.children[0]?.bounds, { x: 0, y: 1, w: 8, h: 1 });

      const renderer = createRecordingRenderer();
      overlay.draw(renderer, createLayout(node), CURSOR_UNAVAILABLE);
      assert.deepEqual(renderer.texts(), ["0,1:[ Item ]"]);
      assert.deepEqual(renderer.ops()[0], {
        kind: "pushLayer",
        bounds: { x: 0, y: 1, w: 8, h: 1 },
      });
    } finally {
      overlay.dispose?.();
    }
  });

  test("routes clicks, hover and hit tests to the overlay content", () => {
    const { widget, tree } = mount(responsive(() => menu()));
    const overlay = widget.overlay?.(tree, FRAME, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;

    try {
      const layout = createLayout(overlay.layout(size(40, 10)));
      const cursor = cursorAt(2, 1);
      const shell = createShell<string>();
      shell.publish("before");

      assert.equal(overlay.isOver?.(layout, { x: 2, y: 1 }), true);
      assert.equal(overlay.isOver?.(layout, { x: 30, y: 8 }), false);
      assert.equal(overlay.mouseInteraction?.(layout, cursor, VIEWPORT), "pointer");
      const down = mouseEvent("down", 2, 1);
      const up = mouseEvent("up", 2, 1);
      assert.equal(overlay.onEvent?.(down, layout, cursor, shell), "captured");
      assert.equal(overlay.onEvent?.(up, layout, cursor, shell), "captured");
      assert.deepEqual(shell.messages(), ["before", "pick"]);
    } finally {
      overlay.dispose?.();
    }
  });

  test("layout invalidation from the overlay clears the cached content layout", () => {
    const counter = { layouts: 0 };
    const counted: Widget<string> = {
      kind: "counted",
      size: () => ({ width: "shrink", height: "shrink" }),
      layout() {
        counter.layouts++;
        return createLayoutNode(size(4, 1));
      },
      draw: () => {},
    };
    const invalidating: Widget<string> = {
      kind: "invalidating",
      size: () => ({ width: "shrink", height: "shrink" }),
      layout: () => createLayoutNode(size(4, 1)),
      draw: () => {},
      onEvent(_tree: StateTree, event: UiEvent, _layout: Layout, _cursor: Cursor, shell: Shell<string>) {
        if (event.kind !== "key") return "ignored";
        if (event.key === "grow") shell.invalidateLayout();
        return "captured";
      },
    };
    const { widget, tree } = mount(responsive(() => popover(counted, invalidating, { open: true })));

    function sendKey(key: string): Shell<string> {
      const overlay = widget.overlay?.(tree, FRAME, ZERO_VECTOR);
      if (!overlay) throw new Error("expected an overlay");
      const shell = createShell<string>();
      try {
        const layout = createLayout(overlay.layout(size(40, 10)));
        overlay.onEvent?.(keyEvent(key), layout, CURSOR_UNAVAILABLE, shell);
      } finally {
        overlay.dispose?.();
      }
      return shell;
    }

    assert.equal(sendKey("other").isLayoutInvalid(), false);
    assert.equal(counter.layouts, 1);
    widget.draw(tree, createRecordingRenderer(), FRAME, CURSOR_UNAVAILABLE, VIEWPORT);
    assert.equal(counter.layouts, 1);

    assert.equal(sendKey("grow").isLayoutInvalid(), true);
    widget.draw(tree, createRecordingRenderer(), FRAME, CURSOR_UNAVAILABLE, VIEWPORT);
    assert.equal(counter.layouts, 2);
  });

  test("overlays of the overlay content are reachable through the bundle", () => {
    const inner = popover(
      button<string>("Sub", { onPress: "sub" }),
      column([button("Leaf", { onPress: "leaf" })]),
      { open: true },
    );
    const { widget, tree } = mount(responsive(() => menu(column([inner]))));
    const overlay = widget.overlay?.(tree, FRAME, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;

    try {
      const node = overlay.layout(size(40, 10));
      assert.equal(node.children.length, 2);

      const renderer = createRecordingRenderer();
      overlay.draw(renderer, createLayout(node), CURSOR_UNAVAILABLE);
      assert.deepEqual(renderer.texts(), ["0,1:[ Sub ]", "0,2:[ Leaf ]"]);

      const shell = createShell<string>();
      const layout = createLayout(node);
      overlay.onEvent?.(mouseEvent("down", 1, 2), layout, cursorAt(1, 2), shell);
      overlay.onEvent?.(mouseEvent("up", 1, 2), layout, cursorAt(1, 2), shell);
      assert.deepEqual(shell.messages(), ["leaf"]);
    } finally {
      overlay.dispose?.();
    }
  });
});
