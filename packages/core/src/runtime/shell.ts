/**
 * packages/core/src/runtime/shell.ts — Side channel for a single dispatch call.
 *
 * Why: Widgets never return messages or invalidation signals directly. They
 * push them into a Shell during the call; the caller inspects the shell after
 * the call returns. A widget that isolates its children (responsive content,
 * overlays) hands them a local shell and merges it into the outer one
 * afterwards, which preserves emission order.
 */

/** When a redraw was requested: on the next frame, or at a timestamp (ms). */
export type RedrawRequest = "next-frame" | Readonly<{ atMs: number }>;

export type Shell<M> = Readonly<{
  /** Emit a message to the application. */
  publish: (message: M) => void;
  /** Messages published so far, in emission order. */
  messages: () => readonly M[];
  /** Signal that some widget changed its own size requirements. */
  invalidateLayout: () => void;
  isLayoutInvalid: () => boolean;
  /** Signal that the widget tree itself must be rebuilt. */
  invalidateWidgets: () => void;
  areWidgetsInvalid: () => boolean;
  requestRedraw: (at?: RedrawRequest) => void;
  redrawRequest: () => RedrawRequest | null;
  /**
   * Fold another shell into this one: its messages are mapped and appended in
   * their original order, invalidation flags are OR-ed, the earliest redraw
   * request wins.
   */
  merge: <N>(other: Shell<N>, map: (message: N) => M) => void;
}>;

function earliestRedraw(a: RedrawRequest | null, b: RedrawRequest | null): RedrawRequest | null {
  if (a === null) return b;
  if (b === null) return a;
  if (a === "next-frame" || b === "next-frame") return "next-frame";
  return a.atMs <= b.atMs ? a : b;
}

export function createShell<M>(): Shell<M> {
  const messages: M[] = [];
  let layoutInvalid = false;
  let widgetsInvalid = false;
  let redraw: RedrawRequest | null = null;

  const shell: Shell<M> = Object.freeze({
    publish(message: M): void {
      messages.push(message);
    },
    messages(): readonly M[] {
      return messages;
    },
    invalidateLayout(): void {
      layoutInvalid = true;
    },
    isLayoutInvalid(): boolean {
      return layoutInvalid;
    },
    invalidateWidgets(): void {
      widgetsInvalid = true;
    },
    areWidgetsInvalid(): boolean {
      return widgetsInvalid;
    },
    requestRedraw(at: RedrawRequest = "next-frame"): void {
      redraw = earliestRedraw(redraw, at);
    },
    redrawRequest(): RedrawRequest | null {
      return redraw;
    },
    merge<N>(other: Shell<N>, map: (message: N) => M): void {
      for (const message of other.messages()) {
        messages.push(map(message));
      }
      if (other.isLayoutInvalid()) layoutInvalid = true;
      if (other.areWidgetsInvalid()) widgetsInvalid = true;
      redraw = earliestRedraw(redraw, other.redrawRequest());
    },
  });
  return shell;
}

export function identity<T>(value: T): T {
  return value;
}
