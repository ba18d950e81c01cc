/**
 * packages/core/src/runtime/exclusiveCell.ts — Runtime-checked exclusive access.
 *
 * Why: Some state (cached responsive content, its runtime state tree) must
 * have a single writer at any time, and a writer can hold access across
 * several host-driven calls (an overlay lives for the rest of a frame). The
 * type system cannot see that span, so access is checked at runtime.
 *
 * Rules:
 *   - At most one live guard per cell
 *   - A second borrow while a guard is live throws PLYUI_BORROW_CONFLICT
 *     immediately; there is no waiting and no retry
 *   - A released guard can no longer reach the value (PLYUI_USE_AFTER_RELEASE)
 */

import { throwCode } from "../errors.js";

export type BorrowGuard<T> = Readonly<{
  /** The borrowed value. Throws once the guard is released. */
  readonly value: T;
  readonly owner: string;
  readonly released: boolean;
  /** Give access back to the cell. Idempotent. */
  release: () => void;
}>;

export type ExclusiveCell<T> = Readonly<{
  readonly label: string;
  borrow: (owner: string) => BorrowGuard<T>;
  isBorrowed: () => boolean;
  /** Owner of the live guard, or null. */
  holder: () => string | null;
  /** Read access outside any borrow. Throws while a guard is live. */
  peek: () => T;
}>;

export function createExclusiveCell<T>(initial: T, label: string): ExclusiveCell<T> {
  const value = initial;
  let active: { owner: string } | null = null;

  function conflict(requester: string): never {
    throwCode(
      "PLYUI_BORROW_CONFLICT",
      `${label}: "${requester}" requested exclusive access while "${active?.owner ?? "?"}" holds it`,
    );
  }

  return Object.freeze({
    label,
    borrow(owner: string): BorrowGuard<T> {
      if (active !== null) conflict(owner);
      const token = { owner };
      active = token;
      let released = false;
      return Object.freeze({
        get value(): T {
          if (released) {
            throwCode("PLYUI_USE_AFTER_RELEASE", `${label}: guard of "${owner}" used after release`);
          }
          return value;
        },
        owner,
        get released(): boolean {
          return released;
        },
        release(): void {
          if (released) return;
          released = true;
          if (active === token) active = null;
        },
      });
    },
    isBorrowed(): boolean {
      return active !== null;
    },
    holder(): string | null {
      return active?.owner ?? null;
    },
    peek(): T {
      if (active !== null) conflict("peek");
      return value;
    },
  });
}

/** Borrow for the duration of `fn`; the guard is released even if `fn` throws. */
export function withExclusive<T, R>(
  cell: ExclusiveCell<T>,
  owner: string,
  fn: (value: T) => R,
): R {
  const guard = cell.borrow(owner);
  try {
    return fn(guard.value);
  } finally {
    guard.release();
  }
}
