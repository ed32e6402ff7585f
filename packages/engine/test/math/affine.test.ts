import { describe, it, expect } from "vitest";
import {
  IDENTITY,
  applyToPoint,
  concat,
  invert,
  rotationTransform,
  scaleTransform,
  translationTransform,
} from "../../src/math/affine";

describe("affine transforms", () => {
  it("concat applies the second transform first", () => {
    const t = concat(translationTransform(10, 0), scaleTransform(2, 2));
    expect(applyToPoint(t, { x: 1, y: 1 })).toEqual({ x: 12, y: 2 });
  });

  it("rotation is counter-clockwise", () => {
    const p = applyToPoint(rotationTransform(Math.PI / 2), { x: 1, y: 0 });
    expect(p.x).toBeCloseTo(0, 12);
    expect(p.y).toBeCloseTo(1, 12);
  });

  it("identity leaves points alone", () => {
    expect(applyToPoint(IDENTITY, { x: 3, y: -4 })).toEqual({ x: 3, y: -4 });
  });

  it("invert undoes the transform", () => {
    const t = concat(translationTransform(5, -3), concat(rotationTransform(0.7), scaleTransform(2, 0.5)));
    const inverse = invert(t);
    expect(inverse).not.toBeNull();
    if (inverse === null) return;

    const p = applyToPoint(inverse, applyToPoint(t, { x: 1.5, y: 2 }));
    expect(p.x).toBeCloseTo(1.5, 10);
    expect(p.y).toBeCloseTo(2, 10);
  });

  it("singular matrices have no inverse", () => {
    expect(invert(scaleTransform(0, 1))).toBeNull();
  });
});
