import type { InputState, Vec2 } from "@kinetica/contracts";
import { DIGITAL_INPUTS } from "@kinetica/contracts";
import { normalize } from "../math/vector";

/**
 * Returns a copy of `input` with pointer edges derived from the previous
 * tick's pointer-down flag.
 */
export function withEdgeDetection(input: InputState, previousPointerDown: boolean): InputState {
  return {
    ...input,
    pointerJustPressed: input.pointerDown && !previousPointerDown,
    pointerJustReleased: !input.pointerDown && previousPointerDown,
  };
}

export function clearEdgeFlags(input: InputState): InputState {
  return { ...input, pointerJustPressed: false, pointerJustReleased: false };
}

/** Normalized direction from the directional flags; up is +y. */
export function inputDirection(input: InputState): Vec2 {
  let dx = 0;
  let dy = 0;
  if (input.left) dx -= 1;
  if (input.right) dx += 1;
  if (input.down) dy -= 1;
  if (input.up) dy += 1;
  return normalize({ x: dx, y: dy });
}

export function hasDirectionalInput(input: InputState): boolean {
  return input.up || input.down || input.left || input.right;
}

export function hasActionInput(input: InputState): boolean {
  return input.action || input.action2;
}

export function hasAnyInput(input: InputState): boolean {
  return hasDirectionalInput(input) || hasActionInput(input) || input.pause || input.pointerDown;
}

/** e.g. "InputState(up, action, pointer)" */
export function describeInput(input: InputState): string {
  const parts: string[] = DIGITAL_INPUTS.filter((key) => input[key]);
  if (input.pointerDown) parts.push("pointer");
  return `InputState(${parts.join(", ")})`;
}
