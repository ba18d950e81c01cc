/**
 * Event types for the ply-ui runtime.
 *
 * Events arrive from the host already decoded; the core never touches a
 * platform event loop.
 */

import { rectContainsPoint } from "./layout/hitTest.js";
import type { Point, Rect } from "./layout/types.js";

// =============================================================================
// UiEvent Union
// =============================================================================

export type MouseButton = "left" | "right" | "middle";

export type MouseAction = "move" | "down" | "up" | "wheel";

export type KeyAction = "down" | "up";

/**
 * Input events dispatched into the widget tree.
 */
export type UiEvent =
  | Readonly<{
      kind: "mouse";
      action: MouseAction;
      x: number;
      y: number;
      /** Button for down/up, null for move/wheel. */
      button: MouseButton | null;
      wheelY: number;
    }>
  | Readonly<{ kind: "key"; action: KeyAction; key: string; mods: number }>
  | Readonly<{ kind: "text"; text: string }>
  | Readonly<{ kind: "resize"; w: number; h: number }>;

/** Whether a widget consumed an event. */
export type EventStatus = "captured" | "ignored";

export function mergeEventStatus(a: EventStatus, b: EventStatus): EventStatus {
  return a === "captured" || b === "captured" ? "captured" : "ignored";
}

// =============================================================================
// Cursor
// =============================================================================

/**
 * Pointer state handed to widgets. "unavailable" hides the pointer from
 * widgets covered by an overlay.
 */
export type Cursor =
  | Readonly<{ kind: "available"; position: Point }>
  | Readonly<{ kind: "unavailable" }>;

export const CURSOR_UNAVAILABLE: Cursor = Object.freeze({ kind: "unavailable" });

export function cursorAt(x: number, y: number): Cursor {
  return Object.freeze({ kind: "available", position: Object.freeze({ x, y }) });
}

export function cursorPosition(cursor: Cursor): Point | null {
  return cursor.kind === "available" ? cursor.position : null;
}

export function cursorIsOver(cursor: Cursor, rect: Rect): boolean {
  return cursor.kind === "available" && rectContainsPoint(rect, cursor.position);
}

// =============================================================================
// Mouse interaction (cursor shape)
// =============================================================================

const MOUSE_INTERACTION_ORDER = [
  "none",
  "idle",
  "pointer",
  "grab",
  "text",
  "crosshair",
  "not-allowed",
] as const;

/** Cursor shape requested by a widget. Later entries win when merged. */
export type MouseInteraction = (typeof MOUSE_INTERACTION_ORDER)[number];

export function maxMouseInteraction(a: MouseInteraction, b: MouseInteraction): MouseInteraction {
  return MOUSE_INTERACTION_ORDER.indexOf(a) >= MOUSE_INTERACTION_ORDER.indexOf(b) ? a : b;
}

// =============================================================================
// Event builders
// =============================================================================

export function mouseEvent(
  action: MouseAction,
  x: number,
  y: number,
  button: MouseButton | null = action === "down" || action === "up" ? "left" : null,
): UiEvent {
  return Object.freeze({ kind: "mouse", action, x, y, button, wheelY: 0 });
}

export function keyEvent(key: string, action: KeyAction = "down", mods = 0): UiEvent {
  return Object.freeze({ kind: "key", action, key, mods });
}
