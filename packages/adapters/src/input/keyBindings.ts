import type { DigitalInput } from "@kinetica/contracts";

/** Key code → the digital input it drives. */
export type KeyBindings = Readonly<Record<string, DigitalInput>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  KeyW: "up",
  ArrowUp: "up",
  KeyS: "down",
  ArrowDown: "down",
  KeyA: "left",
  ArrowLeft: "left",
  KeyD: "right",
  ArrowRight: "right",
  Space: "action",
  Enter: "action",
  ShiftLeft: "action2",
  ShiftRight: "action2",
  Escape: "pause",
};
