/**
 * Built-in operations: id collection and focus changes.
 */

import type { Rect } from "../layout/types.js";
import type { FocusableState, Operation, WidgetId } from "./types.js";

export type CollectedWidget = Readonly<{ id: WidgetId; bounds: Rect }>;

export type CollectWidgetIdsOperation = Operation &
  Readonly<{
    /** Ids met so far in traversal order. */
    result: () => readonly CollectedWidget[];
  }>;

export function collectWidgetIds(): CollectWidgetIdsOperation {
  const found: CollectedWidget[] = [];
  const operation: CollectWidgetIdsOperation = Object.freeze({
    container(id: WidgetId | null, bounds: Rect, operateOnChildren: (op: Operation) => void): void {
      if (id !== null) found.push(Object.freeze({ id, bounds }));
      operateOnChildren(operation);
    },
    focusable(id: WidgetId | null, bounds: Rect): void {
      if (id !== null) found.push(Object.freeze({ id, bounds }));
    },
    result(): readonly CollectedWidget[] {
      return found;
    },
  });
  return operation;
}

/** Focus the widget with `target` id and unfocus every other focusable. */
export function focusWidget(target: WidgetId): Operation {
  const operation: Operation = Object.freeze({
    container(_id: WidgetId | null, _bounds: Rect, operateOnChildren: (op: Operation) => void) {
      operateOnChildren(operation);
    },
    focusable(id: WidgetId | null, _bounds: Rect, state: FocusableState): void {
      state.focused = id === target;
    },
  });
  return operation;
}
