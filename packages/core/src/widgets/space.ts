/**
 * packages/core/src/widgets/space.ts — Empty spacer widget.
 *
 * Why: Takes up space and draws nothing. `space(0, 0)` is the placeholder a
 * responsive widget holds before its first build.
 */

import { type Limits, resolveLimits } from "../layout/limits.js";
import { type LayoutNode, createLayoutNode } from "../layout/node.js";
import { type Length, type SizePreference, ZERO_SIZE } from "../layout/types.js";
import type { StateTree } from "../runtime/stateTree.js";
import type { Widget } from "./types.js";

export function space<M>(width: Length = "fill", height: Length = "fill"): Widget<M> {
  const preference: SizePreference = Object.freeze({ width, height });
  const widget: Widget<M> = {
    kind: "space",
    size(): SizePreference {
      return preference;
    },
    layout(_tree: StateTree, limits: Limits): LayoutNode {
      return createLayoutNode(resolveLimits(limits, preference, ZERO_SIZE));
    },
    draw(): void {},
  };
  return Object.freeze(widget);
}
