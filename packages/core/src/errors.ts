/**
 * packages/core/src/errors.ts — Error codes for deterministic runtime violations.
 *
 * Why: The core has no recoverable error conditions. Everything it throws is a
 * programming defect (aliased exclusive access, use of a released borrow, a
 * state read through the wrong tag) and is surfaced as a coded PlyUiError so
 * callers and tests can match on `code` instead of message text.
 */

/**
 * Deterministic error codes for all runtime violations.
 */
export type PlyUiErrorCode =
  | "PLYUI_BORROW_CONFLICT"
  | "PLYUI_USE_AFTER_RELEASE"
  | "PLYUI_INVALID_STATE"
  | "PLYUI_INVALID_PROPS";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class PlyUiError extends Error {
  override readonly name = "PlyUiError";
  readonly code: PlyUiErrorCode;

  constructor(code: PlyUiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PlyUiError);
    }
  }
}

export function throwCode(code: PlyUiErrorCode, detail: string): never {
  throw new PlyUiError(code, detail);
}

export function isPlyUiError(value: unknown, code?: PlyUiErrorCode): value is PlyUiError {
  if (!(value instanceof PlyUiError)) return false;
  return code === undefined || value.code === code;
}
