/**
 * @ply-ui/core
 *
 * Runtime-agnostic TypeScript core for ply-ui: widget contracts, the runtime
 * state tree, the per-frame driver and the responsive widget.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { PlyUiError, isPlyUiError, type PlyUiErrorCode } from "./errors.js";

// =============================================================================
// Events
// =============================================================================

export {
  CURSOR_UNAVAILABLE,
  cursorAt,
  cursorIsOver,
  cursorPosition,
  keyEvent,
  maxMouseInteraction,
  mergeEventStatus,
  mouseEvent,
} from "./events.js";
export type {
  Cursor,
  EventStatus,
  KeyAction,
  MouseAction,
  MouseButton,
  MouseInteraction,
  UiEvent,
} from "./events.js";

// =============================================================================
// Layout
// =============================================================================

export {
  FILL,
  ZERO_SIZE,
  ZERO_VECTOR,
  size,
  sizeEquals,
  translateRect,
} from "./layout/types.js";
export type {
  Axis,
  Length,
  Point,
  Rect,
  Size,
  SizePreference,
  Vector,
} from "./layout/types.js";
export {
  createLimits,
  limitsMax,
  looseLimits,
  resolveLimits,
  shrinkLimits,
} from "./layout/limits.js";
export type { Limits } from "./layout/limits.js";
export {
  createLayout,
  createLayoutNode,
  layoutBounds,
  layoutChildren,
  layoutPosition,
  layoutWithOffset,
  moveLayoutNode,
} from "./layout/node.js";
export type { Layout, LayoutNode } from "./layout/node.js";
export { contains, rectContainsPoint } from "./layout/hitTest.js";

// =============================================================================
// Runtime
// =============================================================================

export { createShell, identity } from "./runtime/shell.js";
export type { RedrawRequest, Shell } from "./runtime/shell.js";
export {
  childTree,
  createStateTree,
  defineStateTag,
  diffChildren,
  diffStateTree,
  emptyStateTree,
} from "./runtime/stateTree.js";
export type { AnyStateTag, StateTag, StateTree } from "./runtime/stateTree.js";
export { createExclusiveCell, withExclusive } from "./runtime/exclusiveCell.js";
export type { BorrowGuard, ExclusiveCell } from "./runtime/exclusiveCell.js";
export { DEV_MODE, createDevWarner } from "./runtime/devWarnings.js";
export type { DevWarner, DevWarningOptions, WarnFn } from "./runtime/devWarnings.js";
export { buildUserInterface } from "./runtime/userInterface.js";
export type {
  UpdateResult,
  UserInterface,
  UserInterfaceCache,
  UserInterfaceOptions,
} from "./runtime/userInterface.js";

// =============================================================================
// Rendering
// =============================================================================

export type { DrawStyle, Renderer } from "./renderer/types.js";

// =============================================================================
// Widgets and overlays
// =============================================================================

export type {
  A11yNode,
  A11yRole,
  A11yTree,
  DndDestinationRectangle,
  DndDestinationRectangles,
  FocusableState,
  Operation,
  Overlay,
  Widget,
  WidgetId,
} from "./widgets/types.js";
export {
  createDndDestinationRectangles,
  disposeOverlay,
  emptyA11yTree,
  mergeA11yTrees,
} from "./widgets/widget.js";
export { collectWidgetIds, focusWidget } from "./widgets/operation.js";
export type { CollectWidgetIdsOperation, CollectedWidget } from "./widgets/operation.js";
export { createNestedOverlay } from "./overlay/nested.js";
export { groupOverlays } from "./overlay/group.js";

export { ui } from "./widgets/ui.js";
export { space } from "./widgets/space.js";
export { text, type TextProps } from "./widgets/text.js";
export { column, row, type StackProps } from "./widgets/stack.js";
export { BUTTON_STATE, button, type ButtonProps, type ButtonState } from "./widgets/button.js";
export { popover, type PopoverProps } from "./widgets/popover.js";
export {
  RESPONSIVE_STATE,
  createCachedContent,
  layoutContent,
  resolveContent,
  responsive,
  updateContent,
} from "./widgets/responsive.js";
export type {
  CachedContent,
  ResponsiveOptions,
  ResponsiveState,
  ResponsiveView,
} from "./widgets/responsive.js";
