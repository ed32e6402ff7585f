import type { Vec2 } from "../geometry/geometry";

/**
 * Polled state of every input device for one host frame.
 *
 * The host fills the level-triggered fields (held buttons, pointer). The game
 * loop derives pointerJustPressed / pointerJustReleased itself by comparing
 * pointerDown with the previous tick, and clears them after the first fixed
 * step so an edge is seen exactly once.
 */
export interface InputState {
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;

  /** Primary action (Space, Enter, gamepad A) */
  action: boolean;
  /** Secondary action (Shift, gamepad B) */
  action2: boolean;
  pause: boolean;

  /** Pointer position in view coordinates, null when no pointer is active */
  pointerPosition: Vec2 | null;
  pointerDown: boolean;
  pointerJustPressed: boolean;
  pointerJustReleased: boolean;
}

export type DigitalInput =
  | "up"
  | "down"
  | "left"
  | "right"
  | "action"
  | "action2"
  | "pause";

export const DIGITAL_INPUTS: readonly DigitalInput[] = [
  "up",
  "down",
  "left",
  "right",
  "action",
  "action2",
  "pause",
];

/** An input state with everything released. */
export function createInputState(partial: Partial<InputState> = {}): InputState {
  return {
    up: false,
    down: false,
    left: false,
    right: false,
    action: false,
    action2: false,
    pause: false,
    pointerPosition: null,
    pointerDown: false,
    pointerJustPressed: false,
    pointerJustReleased: false,
    ...partial,
  };
}
