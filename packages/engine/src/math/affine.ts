import type { AffineTransform, Vec2 } from "@kinetica/contracts";

export const IDENTITY: Readonly<AffineTransform> = Object.freeze({
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  tx: 0,
  ty: 0,
});

/**
 * Returns `first` followed by `second` applied in `first`'s local space,
 * i.e. the matrix product first × second. Mapping a point through the result
 * equals mapping it through `second` and then through `first`.
 */
export function concat(first: AffineTransform, second: AffineTransform): AffineTransform {
  return {
    a: first.a * second.a + first.c * second.b,
    b: first.b * second.a + first.d * second.b,
    c: first.a * second.c + first.c * second.d,
    d: first.b * second.c + first.d * second.d,
    tx: first.a * second.tx + first.c * second.ty + first.tx,
    ty: first.b * second.tx + first.d * second.ty + first.ty,
  };
}

export function translationTransform(x: number, y: number): AffineTransform {
  return { a: 1, b: 0, c: 0, d: 1, tx: x, ty: y };
}

export function rotationTransform(radians: number): AffineTransform {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return { a: cos, b: sin, c: -sin, d: cos, tx: 0, ty: 0 };
}

export function scaleTransform(sx: number, sy: number): AffineTransform {
  return { a: sx, b: 0, c: 0, d: sy, tx: 0, ty: 0 };
}

export function translated(t: AffineTransform, x: number, y: number): AffineTransform {
  return concat(t, translationTransform(x, y));
}

export function rotated(t: AffineTransform, radians: number): AffineTransform {
  return concat(t, rotationTransform(radians));
}

export function scaled(t: AffineTransform, sx: number, sy: number): AffineTransform {
  return concat(t, scaleTransform(sx, sy));
}

export function applyToPoint(t: AffineTransform, p: Vec2): Vec2 {
  return {
    x: t.a * p.x + t.c * p.y + t.tx,
    y: t.b * p.x + t.d * p.y + t.ty,
  };
}

export function determinant(t: AffineTransform): number {
  return t.a * t.d - t.b * t.c;
}

/** Inverse transform, or null when the matrix is singular. */
export function invert(t: AffineTransform): AffineTransform | null {
  const det = determinant(t);
  if (det === 0 || !Number.isFinite(det)) return null;
  const inv = 1 / det;
  return {
    a: t.d * inv,
    b: -t.b * inv,
    c: -t.c * inv,
    d: t.a * inv,
    tx: (t.c * t.ty - t.d * t.tx) * inv,
    ty: (t.b * t.tx - t.a * t.ty) * inv,
  };
}
