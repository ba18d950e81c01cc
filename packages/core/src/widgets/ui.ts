/**
 * packages/core/src/widgets/ui.ts — Widget factory namespace.
 *
 * Why: One import for building widget trees:
 *
 * @example
 * ```ts
 * const view = ui.responsive<Msg>((size) =>
 *   size.w < 60
 *     ? ui.column([ui.text("narrow"), ui.button("Save", { onPress: "save" })])
 *     : ui.row([ui.text("wide"), ui.button("Save", { onPress: "save" })]),
 * );
 * ```
 */

import { button } from "./button.js";
import { popover } from "./popover.js";
import { responsive } from "./responsive.js";
import { space } from "./space.js";
import { column, row } from "./stack.js";
import { text } from "./text.js";

export const ui = {
  space,
  text,
  column,
  row,
  button,
  popover,
  responsive,
} as const;
