import { describe, it, expect } from "vitest";
import { createInputState } from "@kinetica/contracts";
import {
  clearEdgeFlags,
  describeInput,
  hasActionInput,
  hasAnyInput,
  hasDirectionalInput,
  inputDirection,
  withEdgeDetection,
} from "../../src/input/edges";

describe("withEdgeDetection", () => {
  it("flags a press on the first down frame only", () => {
    const down = createInputState({ pointerDown: true });
    expect(withEdgeDetection(down, false).pointerJustPressed).toBe(true);
    expect(withEdgeDetection(down, true).pointerJustPressed).toBe(false);
  });

  it("flags a release", () => {
    const up = createInputState();
    const result = withEdgeDetection(up, true);
    expect(result.pointerJustReleased).toBe(true);
    expect(result.pointerJustPressed).toBe(false);
  });

  it("does not modify its input", () => {
    const down = createInputState({ pointerDown: true });
    withEdgeDetection(down, false);
    expect(down.pointerJustPressed).toBe(false);
  });

  it("clears edge flags and keeps levels", () => {
    const cleared = clearEdgeFlags(
      createInputState({ pointerDown: true, pointerJustPressed: true, pointerJustReleased: true })
    );
    expect(cleared.pointerJustPressed).toBe(false);
    expect(cleared.pointerJustReleased).toBe(false);
    expect(cleared.pointerDown).toBe(true);
  });
});

describe("input queries", () => {
  it("normalizes diagonal directions with up as +y", () => {
    const direction = inputDirection(createInputState({ up: true, right: true }));
    expect(direction.x).toBeCloseTo(Math.SQRT1_2, 12);
    expect(direction.y).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it("cancels opposite directions", () => {
    expect(inputDirection(createInputState({ left: true, right: true }))).toEqual({ x: 0, y: 0 });
  });

  it("classifies input", () => {
    const idle = createInputState();
    expect(hasAnyInput(idle)).toBe(false);
    expect(hasDirectionalInput(createInputState({ down: true }))).toBe(true);
    expect(hasActionInput(createInputState({ action2: true }))).toBe(true);
    expect(hasAnyInput(createInputState({ pointerDown: true }))).toBe(true);
  });

  it("describes held inputs", () => {
    expect(describeInput(createInputState({ up: true, action: true, pointerDown: true }))).toBe(
      "InputState(up, action, pointer)"
    );
    expect(describeInput(createInputState())).toBe("InputState()");
  });
});
