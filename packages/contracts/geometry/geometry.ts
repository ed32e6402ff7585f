/**
 * Plain 2D value records shared by every stage of the frame pipeline.
 *
 * These carry no behavior so they can be copied across a runtime boundary
 * (worker, GPU host, scripting host) without losing meaning. Arithmetic on
 * them lives in the engine's math module.
 */

/** A point or vector. Scene space is y-up. */
export interface Vec2 {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned rectangle anchored at its minimum corner. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Inclusive numeric interval. Either bound may be infinite. */
export interface Range {
  lower: number;
  upper: number;
}

/** Row-major 2D affine matrix: x' = a*x + c*y + tx, y' = b*x + d*y + ty. */
export interface AffineTransform {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function size(width: number, height: number): Size {
  return { width, height };
}

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

/** The full 0..1 texture space. */
export const UNIT_RECT: Readonly<Rect> = Object.freeze({ x: 0, y: 0, width: 1, height: 1 });
