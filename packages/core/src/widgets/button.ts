/**
 * packages/core/src/widgets/button.ts — Clickable label.
 *
 * Press/release model: a left press inside the bounds arms the button; the
 * matching release publishes `onPress` only if it also lands inside the
 * bounds. The armed flag and focus live in the runtime state tree, so they
 * survive rebuilds of an identical button.
 */

import {
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
  cursorIsOver,
} from "../events.js";
import { contains } from "../layout/hitTest.js";
import { type Limits, resolveLimits } from "../layout/limits.js";
import { type Layout, type LayoutNode, createLayoutNode, layoutBounds } from "../layout/node.js";
import { type Length, type Rect, type SizePreference, size } from "../layout/types.js";
import type { Renderer } from "../renderer/types.js";
import type { Shell } from "../runtime/shell.js";
import { type StateTree, defineStateTag } from "../runtime/stateTree.js";
import type { A11yTree, FocusableState, Operation, Widget, WidgetId } from "./types.js";

export type ButtonProps<M> = Readonly<{
  id?: WidgetId;
  /** Message published on a completed click. No message means disabled. */
  onPress?: M;
  width?: Length;
  height?: Length;
}>;

export type ButtonState = {
  pressed: boolean;
  focused: boolean;
};

export const BUTTON_STATE = defineStateTag<ButtonState>("button", () => ({
  pressed: false,
  focused: false,
}));

export function button<M>(label: string, props: ButtonProps<M> = {}): Widget<M> {
  const preference: SizePreference = Object.freeze({
    width: props.width ?? "shrink",
    height: props.height ?? "shrink",
  });
  const enabled = props.onPress !== undefined;
  let id: WidgetId | null = props.id ?? null;

  const widget: Widget<M> = {
    kind: "button",
    tag: () => BUTTON_STATE,
    size(): SizePreference {
      return preference;
    },
    layout(_tree: StateTree, limits: Limits): LayoutNode {
      // "[ label ]"
      return createLayoutNode(resolveLimits(limits, preference, size(label.length + 4, 1)));
    },
    draw(tree: StateTree, renderer: Renderer, layout: Layout, cursor: Cursor): void {
      const bounds = layoutBounds(layout);
      const state = BUTTON_STATE.get(tree);
      const hovered = cursorIsOver(cursor, bounds);
      renderer.fillRect(bounds, {
        bg: state.pressed ? "active" : hovered ? "hover" : "idle",
        bold: state.focused,
      });
      renderer.drawText(`[ ${label} ]`.slice(0, bounds.w), bounds);
    },
    onEvent(
      tree: StateTree,
      event: UiEvent,
      layout: Layout,
      cursor: Cursor,
      shell: Shell<M>,
      _viewport: Rect,
    ): EventStatus {
      if (!enabled || event.kind !== "mouse" || event.button !== "left") return "ignored";
      const state = BUTTON_STATE.get(tree);
      const bounds = layoutBounds(layout);
      if (event.action === "down") {
        if (!cursorIsOver(cursor, bounds)) return "ignored";
        state.pressed = true;
        return "captured";
      }
      if (event.action === "up" && state.pressed) {
        state.pressed = false;
        if (cursor.kind === "available" && contains(bounds, event.x, event.y)) {
          if (props.onPress !== undefined) shell.publish(props.onPress);
          return "captured";
        }
      }
      return "ignored";
    },
    mouseInteraction(_tree: StateTree, layout: Layout, cursor: Cursor): MouseInteraction {
      if (!cursorIsOver(cursor, layoutBounds(layout))) return "none";
      return enabled ? "pointer" : "not-allowed";
    },
    operate(tree: StateTree, layout: Layout, operation: Operation): void {
      const state = BUTTON_STATE.get(tree);
      const focusable: FocusableState = { focused: state.focused };
      operation.focusable?.(id, layoutBounds(layout), focusable);
      state.focused = focusable.focused;
    },
    a11yNodes(_tree: StateTree, layout: Layout): A11yTree {
      return [{ id, role: "button", label, bounds: layoutBounds(layout) }];
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
