/**
 * packages/core/src/widgets/text.ts — Single-line text leaf.
 *
 * Width is measured in UTF-16 code units; text is clipped, never wrapped.
 */

import type { Cursor } from "../events.js";
import { type Limits, resolveLimits } from "../layout/limits.js";
import { type Layout, type LayoutNode, createLayoutNode, layoutBounds } from "../layout/node.js";
import { type SizePreference, size } from "../layout/types.js";
import type { DrawStyle, Renderer } from "../renderer/types.js";
import type { StateTree } from "../runtime/stateTree.js";
import type { A11yTree, Widget } from "./types.js";

export type TextProps = Readonly<{
  style?: DrawStyle;
}>;

const SHRINK: SizePreference = Object.freeze({ width: "shrink", height: "shrink" });

export function text<M>(content: string, props: TextProps = {}): Widget<M> {
  const widget: Widget<M> = {
    kind: "text",
    size(): SizePreference {
      return SHRINK;
    },
    layout(_tree: StateTree, limits: Limits): LayoutNode {
      return createLayoutNode(resolveLimits(limits, SHRINK, size(content.length, 1)));
    },
    draw(_tree: StateTree, renderer: Renderer, layout: Layout, _cursor: Cursor): void {
      const bounds = layoutBounds(layout);
      if (bounds.w <= 0 || bounds.h <= 0) return;
      renderer.drawText(content.slice(0, bounds.w), bounds, props.style);
    },
    a11yNodes(_tree: StateTree, layout: Layout): A11yTree {
      return [{ id: null, role: "text", label: content, bounds: layoutBounds(layout) }];
    },
  };
  return Object.freeze(widget);
}
