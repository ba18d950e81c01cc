import { assert, describe, test } from "@ply-ui/testkit";
import { CURSOR_UNAVAILABLE, cursorAt, mouseEvent } from "../../events.js";
import { createLimits } from "../../layout/limits.js";
import { createLayout, layoutBounds } from "../../layout/node.js";
import { ZERO_SIZE, ZERO_VECTOR, size } from "../../layout/types.js";
import { createShell } from "../../runtime/shell.js";
import { createStateTree } from "../../runtime/stateTree.js";
import { createRecordingRenderer } from "../../testing/renderer.js";
import { button } from "../button.js";
import { popover } from "../popover.js";
import { column } from "../stack.js";
import type { Widget } from "../types.js";

function menu(open: boolean): Widget<string> {
  return popover(
    button("Menu", { onPress: "toggle" }),
    column([button("Item", { onPress: "pick" })]),
    { open, onDismiss: "dismiss" },
  );
}

function setup(widget: Widget<string>) {
  const tree = createStateTree(widget);
  const layout = createLayout(widget.layout(tree, createLimits(ZERO_SIZE, size(40, 10))));
  return { tree, layout };
}

describe("popover", () => {
  test("takes the anchor's size", () => {
    const widget = menu(true);
    const { layout } = setup(widget);
    assert.deepEqual(layoutBounds(layout), { x: 0, y: 0, w: 8, h: 1 });
  });

  test("produces no overlay while closed", () => {
    const widget = menu(false);
    const { tree, layout } = setup(widget);
    assert.equal(widget.overlay?.(tree, layout, ZERO_VECTOR), null);
  });

  test("places the open content below the anchor", () => {
    const widget = menu(true);
    const { tree, layout } = setup(widget);
    const overlay = widget.overlay?.(tree, layout, { x: 3, y: 2 });
    assert.ok(overlay);
    if (!overlay) return;

    const node = overlay.layout(size(40, 10));
    assert.deepEqual(node.bounds, { x: 3, y: 3, w: 8, h: 1 });

    const renderer = createRecordingRenderer();
    overlay.draw(renderer, createLayout(node), CURSOR_UNAVAILABLE);
    assert.deepEqual(
      renderer.ops().map((op) => op.kind),
      ["pushLayer", "fillRect", "fillRect", "text", "popLayer"],
    );
    assert.deepEqual(renderer.texts(), ["3,3:[ Item ]"]);
  });

  test("a press outside the content publishes onDismiss", () => {
    const widget = menu(true);
    const { tree, layout } = setup(widget);
    const overlay = widget.overlay?.(tree, layout, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;
    const overlayLayout = createLayout(overlay.layout(size(40, 10)));
    const shell = createShell<string>();

    const status = overlay.onEvent?.(
      mouseEvent("down", 30, 8),
      overlayLayout,
      cursorAt(30, 8),
      shell,
    );
    assert.equal(status, "captured");
    assert.deepEqual(shell.messages(), ["dismiss"]);
  });

  test("the content receives clicks inside it", () => {
    const widget = menu(true);
    const { tree, layout } = setup(widget);
    const overlay = widget.overlay?.(tree, layout, ZERO_VECTOR);
    assert.ok(overlay);
    if (!overlay) return;
    const overlayLayout = createLayout(overlay.layout(size(40, 10)));
    const shell = createShell<string>();
    const cursor = cursorAt(2, 1);

    overlay.onEvent?.(mouseEvent("down", 2, 1), overlayLayout, cursor, shell);
    overlay.onEvent?.(mouseEvent("up", 2, 1), overlayLayout, cursor, shell);
    assert.deepEqual(shell.messages(), ["pick"]);
  });

  test("the anchor still handles its own clicks", () => {
    const widget = menu(false);
    const { tree, layout } = setup(widget);
    const shell = createShell<string>();
    const viewport = { x: 0, y: 0, w: 40, h: 10 };

    widget.onEvent?.(tree, mouseEvent("down", 1, 0), layout, cursorAt(1, 0), shell, viewport);
    widget.onEvent?.(tree, mouseEvent("up", 1, 0), layout, cursorAt(1, 0), shell, viewport);
    assert.deepEqual(shell.messages(), ["toggle"]);
  });
});
