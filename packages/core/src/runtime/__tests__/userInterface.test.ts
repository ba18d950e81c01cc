import { assert, describe, test } from "@ply-ui/testkit";
import { CURSOR_UNAVAILABLE, cursorAt, keyEvent, mouseEvent } from "../../events.js";
import { createLayoutNode } from "../../layout/node.js";
import { FILL, size } from "../../layout/types.js";
import { createRecordingRenderer } from "../../testing/renderer.js";
import { button } from "../../widgets/button.js";
import { collectWidgetIds } from "../../widgets/operation.js";
import { popover } from "../../widgets/popover.js";
import { RESPONSIVE_STATE, responsive } from "../../widgets/responsive.js";
import { column } from "../../widgets/stack.js";
import type { Widget } from "../../widgets/types.js";
import { childTree } from "../stateTree.js";
import { type UserInterfaceCache, buildUserInterface } from "../userInterface.js";

type Message = "toggle" | "pick" | "dismiss";

function app(open: boolean): Widget<Message> {
  return responsive(() =>
    popover(
      button<Message>("Menu", { onPress: "toggle" }),
      column([button<Message>("Item", { onPress: "pick" })]),
      { open, onDismiss: "dismiss" },
    ),
  );
}

/** Open menu whose responsive content opens a submenu of its own. */
function nestedMenu(): Widget<string> {
  return popover(
    button<string>("A", { onPress: "a" }),
    responsive(() =>
      popover(
        button<string>("B", { onPress: "b" }),
        column([button<string>("C", { onPress: "c" })]),
        { open: true },
      ),
    ),
    { open: true },
  );
}

function click(x: number, y: number) {
  return [mouseEvent("down", x, y), mouseEvent("up", x, y)];
}

describe("buildUserInterface", () => {
  test("base content handles events when there is no overlay", () => {
    const ui = buildUserInterface(app(false), size(40, 10));
    const messages: Message[] = [];

    const result = ui.update(click(1, 0), cursorAt(1, 0), messages);
    assert.deepEqual(messages, ["toggle"]);
    assert.deepEqual(result, { state: "updated", statuses: ["captured", "captured"], redraw: null });
  });

  test("an open overlay takes events before the base layer", () => {
    const first = buildUserInterface(app(false), size(40, 10));
    first.update(click(1, 0), cursorAt(1, 0), []);
    const ui = buildUserInterface(app(true), size(40, 10), first.intoCache());
    const messages: Message[] = [];

    ui.update(click(2, 1), cursorAt(2, 1), messages);
    ui.update([mouseEvent("down", 30, 8)], cursorAt(30, 8), messages);
    assert.deepEqual(messages, ["pick", "dismiss"]);
  });

  test("overlay borrows end with each step", () => {
    const ui = buildUserInterface(app(true), size(40, 10));
    ui.update(click(2, 1), cursorAt(2, 1), []);

    const cache: UserInterfaceCache = ui.intoCache();
    assert.equal(RESPONSIVE_STATE.get(cache.tree).tree.isBorrowed(), false);
  });

  test("draws the base layer, then the overlay", () => {
    const ui = buildUserInterface(app(true), size(40, 10));
    const renderer = createRecordingRenderer();

    ui.draw(renderer, CURSOR_UNAVAILABLE);
    assert.deepEqual(renderer.texts(), ["0,0:[ Menu ]", "0,1:[ Item ]"]);
    assert.equal(renderer.ops().filter((op) => op.kind === "pushLayer").length, 1);
  });

  test("mouse interaction prefers the overlay under the cursor", () => {
    const ui = buildUserInterface(app(true), size(40, 10));

    assert.equal(ui.mouseInteraction(cursorAt(2, 1)), "pointer");
    assert.equal(ui.mouseInteraction(cursorAt(2, 0)), "pointer");
    assert.equal(ui.mouseInteraction(cursorAt(30, 8)), "none");
  });

  test("operations visit the base layer, then the overlay", () => {
    const root = responsive<Message>(() =>
      popover(
        button<Message>("Menu", { id: "menu", onPress: "toggle" }),
        column([button<Message>("Item", { id: "item", onPress: "pick" })]),
        { id: "pop", open: true },
      ),
    );
    const ui = buildUserInterface(root, size(40, 10));
    const ids = collectWidgetIds();

    ui.operate(ids);
    assert.deepEqual(
      ids.result().map((found) => found.id),
      ["pop", "menu", "item"],
    );
    assert.deepEqual(ids.result()[2]?.bounds, { x: 0, y: 1, w: 8, h: 1 });
  });

  test("the root fills the window", () => {
    const ui = buildUserInterface(app(false), size(40, 10));
    assert.deepEqual(ui.layout().bounds, { x: 0, y: 0, w: 40, h: 10 });
  });

  test("a widget-invalidation signal marks the interface outdated", () => {
    const rebuilder: Widget<Message> = {
      kind: "rebuilder",
      size: () => FILL,
      layout: (_tree, limits) => createLayoutNode(limits.max),
      draw: () => {},
      onEvent(_tree, event, _layout, _cursor, shell) {
        if (event.kind !== "key") return "ignored";
        shell.invalidateWidgets();
        shell.requestRedraw({ atMs: 16 });
        return "captured";
      },
    };
    const ui = buildUserInterface(rebuilder, size(40, 10));

    const result = ui.update([keyEvent("r")], CURSOR_UNAVAILABLE, []);
    assert.equal(result.state, "outdated");
    assert.deepEqual(result.redraw, { atMs: 16 });
  });

  test("a root larger than the window warns once", () => {
    const lines: string[] = [];
    const oversized: Widget<Message> = {
      kind: "oversized",
      size: () => FILL,
      layout: () => createLayoutNode(size(50, 10)),
      draw: () => {},
    };
    const options = { devMode: true, warn: (line: string) => lines.push(line) };

    buildUserInterface(oversized, size(40, 10), undefined, options);
    assert.deepEqual(lines, ["[ply-ui][ui] root <oversized> laid out at 50x10, window is 40x10"]);
  });

  test("responsive content inside an overlay works alongside its own overlay", () => {
    const ui = buildUserInterface(nestedMenu(), size(20, 10));
    const renderer = createRecordingRenderer();
    const messages: string[] = [];

    ui.draw(renderer, cursorAt(1, 2));
    assert.deepEqual(renderer.texts(), ["0,0:[ A ]", "0,1:[ B ]", "0,2:[ C ]"]);

    const result = ui.update(click(1, 1), cursorAt(1, 1), messages);
    assert.deepEqual(messages, ["b"]);
    assert.deepEqual(result.statuses, ["captured", "captured"]);

    assert.equal(ui.mouseInteraction(cursorAt(1, 2)), "pointer");
    assert.equal(ui.mouseInteraction(cursorAt(10, 5)), "none");

    const content = RESPONSIVE_STATE.get(childTree(ui.intoCache().tree, 1));
    assert.equal(content.tree.isBorrowed(), false);
  });
});
