/**
 * Draw API handed to widgets.
 *
 * All coordinates are in cell units (column, row). Backends decide how a
 * layer maps to their surface; a layer drawn later is on top.
 */

import type { Point, Rect } from "../layout/types.js";

export type DrawStyle = Readonly<{
  fg?: string;
  bg?: string;
  bold?: boolean;
}>;

export interface Renderer {
  /**
   * Fill a rectangle with an optional style.
   */
  fillRect(rect: Rect, style?: DrawStyle): void;

  /**
   * Draw a single line of text starting at `at`.
   */
  drawText(text: string, at: Point, style?: DrawStyle): void;

  /**
   * Run `draw` in a new layer clipped to `bounds`. Overlays use this to draw
   * above regular content.
   */
  withLayer(bounds: Rect, draw: () => void): void;
}
