/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the fundamental geometric types used throughout the layout
 * system. All coordinates are in cell units.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Absolute position in cells. */
export type Point = Readonly<{ x: number; y: number }>;

/** Relative displacement in cells. */
export type Vector = Readonly<{ x: number; y: number }>;

/** Layout axis: row (horizontal) or column (vertical) stacking. */
export type Axis = "row" | "column";

/**
 * Size preference along one axis.
 *
 * - "fill": take all the space the parent offers
 * - "shrink": take only the intrinsic size of the content
 * - number: fixed cell count (clamped to the parent limits)
 */
export type Length = "fill" | "shrink" | number;

/** Size preference a widget reports to its parent before layout. */
export type SizePreference = Readonly<{ width: Length; height: Length }>;

export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });
export const ZERO_VECTOR: Vector = Object.freeze({ x: 0, y: 0 });

export const FILL: SizePreference = Object.freeze({ width: "fill", height: "fill" });

export function size(w: number, h: number): Size {
  return Object.freeze({ w, h });
}

export function sizeEquals(a: Size, b: Size): boolean {
  return a.w === b.w && a.h === b.h;
}

export function rectPosition(rect: Rect): Point {
  return Object.freeze({ x: rect.x, y: rect.y });
}

export function rectSize(rect: Rect): Size {
  return Object.freeze({ w: rect.w, h: rect.h });
}

export function translateRect(rect: Rect, by: Vector): Rect {
  return Object.freeze({ x: rect.x + by.x, y: rect.y + by.y, w: rect.w, h: rect.h });
}

export function addVectors(a: Vector, b: Vector): Vector {
  return Object.freeze({ x: a.x + b.x, y: a.y + b.y });
}
