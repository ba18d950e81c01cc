import { assert, describe, test } from "@ply-ui/testkit";
import { cursorAt, keyEvent, mouseEvent } from "../../events.js";
import { createLimits } from "../../layout/limits.js";
import { createLayout, layoutBounds } from "../../layout/node.js";
import { FILL, ZERO_SIZE, size } from "../../layout/types.js";
import { createShell } from "../../runtime/shell.js";
import { createStateTree } from "../../runtime/stateTree.js";
import { createRecordingRenderer } from "../../testing/renderer.js";
import { button } from "../button.js";
import { collectWidgetIds } from "../operation.js";
import { space } from "../space.js";
import { column, row } from "../stack.js";
import { text } from "../text.js";
import type { Widget } from "../types.js";

const VIEWPORT = { x: 0, y: 0, w: 80, h: 24 };

describe("row/column layout", () => {
  test("fill children share what fixed children leave, earliest first", () => {
    const widget = row<never>([space("fill", 1), space(3, 1), space("fill", 1)], { spacing: 1 });
    const node = widget.layout(createStateTree(widget), createLimits(ZERO_SIZE, size(20, 5)));

    assert.deepEqual(node.bounds, { x: 0, y: 0, w: 20, h: 1 });
    assert.deepEqual(
      node.children.map((child) => child.bounds),
      [
        { x: 0, y: 0, w: 8, h: 1 },
        { x: 9, y: 0, w: 3, h: 1 },
        { x: 13, y: 0, w: 7, h: 1 },
      ],
    );
  });

  test("padding surrounds the content and counts toward the intrinsic size", () => {
    const widget = column<never>([text("ab")], { padding: 1 });
    const node = widget.layout(createStateTree(widget), createLimits(ZERO_SIZE, size(10, 10)));

    assert.deepEqual(node.bounds, { x: 0, y: 0, w: 4, h: 3 });
    assert.deepEqual(node.children[0]?.bounds, { x: 1, y: 1, w: 2, h: 1 });
  });

  test("a fill child makes the stack fill its main axis", () => {
    assert.deepEqual(column<never>([text("a"), space()]).size(), FILL);
    assert.deepEqual(row<never>([text("a")]).size(), { width: "shrink", height: "shrink" });
    assert.deepEqual(row<never>([text("a")], { width: 12 }).size(), {
      width: 12,
      height: "shrink",
    });
  });
});

describe("row/column forwarding", () => {
  function layoutOf(widget: Widget<string>) {
    const tree = createStateTree(widget);
    const node = widget.layout(tree, createLimits(ZERO_SIZE, size(40, 10)));
    return { tree, layout: createLayout(node) };
  }

  test("draws children at their positions", () => {
    const widget = column<string>([text("one"), text("two")], { spacing: 1 });
    const { tree, layout } = layoutOf(widget);
    const renderer = createRecordingRenderer();

    widget.draw(tree, renderer, layout, cursorAt(0, 0), VIEWPORT);
    assert.deepEqual(renderer.texts(), ["0,0:one", "0,2:two"]);
  });

  test("events reach every child and statuses merge", () => {
    const widget = row<string>([button("A", { onPress: "a" }), button("B", { onPress: "b" })]);
    const { tree, layout } = layoutOf(widget);
    const shell = createShell<string>();
    const cursor = cursorAt(6, 0);

    assert.equal(
      widget.onEvent?.(tree, keyEvent("Enter"), layout, cursor, shell, VIEWPORT),
      "ignored",
    );
    assert.equal(
      widget.onEvent?.(tree, mouseEvent("down", 6, 0), layout, cursor, shell, VIEWPORT),
      "captured",
    );
    widget.onEvent?.(tree, mouseEvent("up", 6, 0), layout, cursor, shell, VIEWPORT);
    assert.deepEqual(shell.messages(), ["b"]);
  });

  test("operations see the container before its children", () => {
    const widget = column<string>(
      [button("A", { id: "a", onPress: "x" }), button("B", { id: "b", onPress: "y" })],
      { id: "col" },
    );
    const { tree, layout } = layoutOf(widget);
    const operation = collectWidgetIds();

    widget.operate?.(tree, layout, operation);
    assert.deepEqual(
      operation.result().map((found) => found.id),
      ["col", "a", "b"],
    );
    assert.deepEqual(operation.result()[2]?.bounds, { x: 0, y: 1, w: 5, h: 1 });
  });

  test("a11y nodes are collected in child order", () => {
    const widget = column<string>([text("hi"), button("Go", { id: "go", onPress: "g" })]);
    const { tree, layout } = layoutOf(widget);

    assert.deepEqual(widget.a11yNodes?.(tree, layout, cursorAt(0, 0)), [
      { id: null, role: "text", label: "hi", bounds: { x: 0, y: 0, w: 2, h: 1 } },
      { id: "go", role: "button", label: "Go", bounds: { x: 0, y: 1, w: 6, h: 1 } },
    ]);
    assert.deepEqual(layoutBounds(layout), { x: 0, y: 0, w: 6, h: 2 });
  });
});
