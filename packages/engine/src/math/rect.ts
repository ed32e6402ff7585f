import type { Rect, Size, Vec2 } from "@kinetica/contracts";

export function minX(r: Rect): number {
  return Math.min(r.x, r.x + r.width);
}

export function maxX(r: Rect): number {
  return Math.max(r.x, r.x + r.width);
}

export function minY(r: Rect): number {
  return Math.min(r.y, r.y + r.height);
}

export function maxY(r: Rect): number {
  return Math.max(r.y, r.y + r.height);
}

export function midpoint(r: Rect): Vec2 {
  return { x: r.x + r.width / 2, y: r.y + r.height / 2 };
}

export function rectFromOrigin(origin: Vec2, size: Size): Rect {
  return { x: origin.x, y: origin.y, width: size.width, height: size.height };
}

export function containsPoint(r: Rect, p: Vec2): boolean {
  return p.x >= minX(r) && p.x <= maxX(r) && p.y >= minY(r) && p.y <= maxY(r);
}

export function union(a: Rect, b: Rect): Rect {
  const x0 = Math.min(minX(a), minX(b));
  const y0 = Math.min(minY(a), minY(b));
  const x1 = Math.max(maxX(a), maxX(b));
  const y1 = Math.max(maxY(a), maxY(b));
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/** Nearest point inside the rect (bounds inclusive). */
export function clampPoint(r: Rect, p: Vec2): Vec2 {
  return {
    x: Math.max(minX(r), Math.min(maxX(r), p.x)),
    y: Math.max(minY(r), Math.min(maxY(r), p.y)),
  };
}
