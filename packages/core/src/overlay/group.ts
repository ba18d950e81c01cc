/**
 * packages/core/src/overlay/group.ts — Several sibling overlays presented as one.
 *
 * Why: A container whose children each produce an overlay still answers the
 * overlay query with a single value. The group lays out every member against
 * the same window bounds and forwards calls to each of them in order.
 */

import {
  type Cursor,
  type EventStatus,
  type MouseInteraction,
  type UiEvent,
  maxMouseInteraction,
  mergeEventStatus,
} from "../events.js";
import { type Layout, type LayoutNode, createLayoutNode, layoutChildren } from "../layout/node.js";
import type { Point, Rect, Size } from "../layout/types.js";
import type { Renderer } from "../renderer/types.js";
import type { Shell } from "../runtime/shell.js";
import type { Operation, Overlay } from "../widgets/types.js";
import {
  disposeOverlay,
  overlayIsOver,
  overlayMouseInteraction,
  overlayNested,
  overlayOnEvent,
  overlayOperate,
} from "../widgets/widget.js";

type Member<M> = Readonly<{ overlay: Overlay<M>; layout: Layout }>;

function zip<M>(overlays: readonly Overlay<M>[], layout: Layout): Member<M>[] {
  const layouts = layoutChildren(layout);
  const out: Member<M>[] = [];
  for (const [i, overlay] of overlays.entries()) {
    const memberLayout = layouts[i];
    if (!memberLayout) continue;
    out.push({ overlay, layout: memberLayout });
  }
  return out;
}

/** Combine overlays; returns null for none and the overlay itself for one. */
export function groupOverlays<M>(overlays: readonly Overlay<M>[]): Overlay<M> | null {
  if (overlays.length === 0) return null;
  const [only] = overlays;
  if (overlays.length === 1 && only) return only;

  const members = Object.freeze([...overlays]);
  const group: Overlay<M> = {
    layout(bounds: Size): LayoutNode {
      return createLayoutNode(
        bounds,
        members.map((overlay) => overlay.layout(bounds)),
      );
    },
    draw(renderer: Renderer, layout: Layout, cursor: Cursor): void {
      for (const member of zip(members, layout)) {
        member.overlay.draw(renderer, member.layout, cursor);
      }
    },
    onEvent(event: UiEvent, layout: Layout, cursor: Cursor, shell: Shell<M>): EventStatus {
      let status: EventStatus = "ignored";
      for (const member of zip(members, layout)) {
        status = mergeEventStatus(
          status,
          overlayOnEvent(member.overlay, event, member.layout, cursor, shell),
        );
      }
      return status;
    },
    mouseInteraction(layout: Layout, cursor: Cursor, viewport: Rect): MouseInteraction {
      let interaction: MouseInteraction = "none";
      for (const member of zip(members, layout)) {
        interaction = maxMouseInteraction(
          interaction,
          overlayMouseInteraction(member.overlay, member.layout, cursor, viewport),
        );
      }
      return interaction;
    },
    isOver(layout: Layout, point: Point): boolean {
      return zip(members, layout).some((member) =>
        overlayIsOver(member.overlay, member.layout, point),
      );
    },
    operate(layout: Layout, operation: Operation): void {
      for (const member of zip(members, layout)) {
        overlayOperate(member.overlay, member.layout, operation);
      }
    },
    overlay(layout: Layout): Overlay<M> | null {
      const nested: Overlay<M>[] = [];
      for (const member of zip(members, layout)) {
        const child = overlayNested(member.overlay, member.layout);
        if (child) nested.push(child);
      }
      return groupOverlays(nested);
    },
    dispose(): void {
      for (const overlay of members) disposeOverlay(overlay);
    },
  };
  return group;
}
