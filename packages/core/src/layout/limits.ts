/**
 * packages/core/src/layout/limits.ts — Min/max layout bounds handed down by parents.
 *
 * Why: A parent layout pass negotiates space with its children through limits.
 * A child resolves its size preference (fill, shrink, fixed) against them.
 */

import { throwCode } from "../errors.js";
import { type Length, type Size, type SizePreference, ZERO_SIZE, size } from "./types.js";

export type Limits = Readonly<{ min: Size; max: Size }>;

function clampNonNegative(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return n <= 0 ? 0 : n;
}

function clampWithin(n: number, min: number, max: number): number {
  if (n < min) return min;
  if (n > max) return max;
  return n;
}

export function createLimits(min: Size, max: Size): Limits {
  const maxW = clampNonNegative(max.w);
  const maxH = clampNonNegative(max.h);
  return Object.freeze({
    min: size(Math.min(clampNonNegative(min.w), maxW), Math.min(clampNonNegative(min.h), maxH)),
    max: size(maxW, maxH),
  });
}

export function limitsMax(limits: Limits): Size {
  return limits.max;
}

/** Drop the minimum bound (children may be smaller than the parent). */
export function looseLimits(limits: Limits): Limits {
  return createLimits(ZERO_SIZE, limits.max);
}

/** Subtract `by` from both bounds (padding, consumed space). */
export function shrinkLimits(limits: Limits, by: Size): Limits {
  return createLimits(
    size(limits.min.w - by.w, limits.min.h - by.h),
    size(limits.max.w - by.w, limits.max.h - by.h),
  );
}

function resolveLength(length: Length, min: number, max: number, intrinsic: number): number {
  if (length === "fill") return max;
  if (length === "shrink") return clampWithin(intrinsic, min, max);
  if (!Number.isFinite(length) || length < 0) {
    throwCode(
      "PLYUI_INVALID_PROPS",
      `fixed length must be a finite non-negative number, got ${String(length)}`,
    );
  }
  return clampWithin(length, min, max);
}

/**
 * Resolve a size preference against the limits.
 *
 * - "fill" takes the maximum bound
 * - "shrink" takes the intrinsic size, clamped into the limits
 * - fixed lengths are clamped into the limits
 */
export function resolveLimits(limits: Limits, preference: SizePreference, intrinsic: Size): Size {
  return size(
    resolveLength(preference.width, limits.min.w, limits.max.w, intrinsic.w),
    resolveLength(preference.height, limits.min.h, limits.max.h, intrinsic.h),
  );
}
