/**
 * Input Adapter
 *
 * Turns pushed key and pointer events into polled InputState snapshots.
 *
 * Implements the push-to-pull reconciliation pattern:
 * - events arrive asynchronously and update held-key and pointer state
 * - snapshot() returns the level-triggered state at the moment of the call
 *
 * Pointer edges are left unset; the game loop derives them per tick.
 */

import type { DigitalInput, InputState, Vec2 } from "@kinetica/contracts";
import { createInputState } from "@kinetica/contracts";
import type { InputSource, KeyEventData, PointerEventData } from "./InputSource";
import type { KeyBindings } from "./keyBindings";
import { DEFAULT_KEY_BINDINGS } from "./keyBindings";

/**
 * Configuration for the input adapter.
 */
export interface InputAdapterConfig {
  /**
   * Key code to digital input table. Unbound keys are ignored.
   * @default WASD and arrows for directions, Space/Enter action,
   * Shift action2, Escape pause
   */
  bindings?: KeyBindings;
}

const DEFAULT_CONFIG: Required<InputAdapterConfig> = {
  bindings: DEFAULT_KEY_BINDINGS,
};

export class InputAdapter {
  private readonly bindings: KeyBindings;
  private readonly source: InputSource;
  private unsubscribers: Array<() => void> = [];

  /** Bound keys currently held */
  private heldKeys = new Set<string>();

  private pointerPosition: Vec2 | null = null;
  private pointerDown = false;

  constructor(source: InputSource, config: InputAdapterConfig = {}) {
    this.source = source;
    this.bindings = { ...DEFAULT_CONFIG, ...config }.bindings;
  }

  /**
   * Start listening to the source.
   */
  start(): void {
    if (this.unsubscribers.length > 0) return;
    this.unsubscribers = [
      this.source.onKey((event) => this.handleKey(event)),
      this.source.onPointer((event) => this.handlePointer(event)),
    ];
  }

  /**
   * Stop listening. Held state is kept until reset().
   */
  stop(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  get isListening(): boolean {
    return this.unsubscribers.length > 0;
  }

  /**
   * The current input state. Each call returns a fresh object.
   */
  snapshot(): InputState {
    const state = createInputState({
      pointerPosition: this.pointerPosition === null ? null : { ...this.pointerPosition },
      pointerDown: this.pointerDown,
    });
    for (const code of this.heldKeys) {
      const input = this.bindings[code];
      if (input !== undefined) {
        state[input] = true;
      }
    }
    return state;
  }

  /** Whether any held key drives `input`. */
  isHeld(input: DigitalInput): boolean {
    for (const code of this.heldKeys) {
      if (this.bindings[code] === input) return true;
    }
    return false;
  }

  /**
   * Release everything. Useful when the window loses focus.
   */
  reset(): void {
    this.heldKeys.clear();
    this.pointerPosition = null;
    this.pointerDown = false;
  }

  private handleKey(event: KeyEventData): void {
    if (!Object.hasOwn(this.bindings, event.code)) return;

    if (event.pressed) {
      this.heldKeys.add(event.code);
    } else {
      this.heldKeys.delete(event.code);
    }
  }

  private handlePointer(event: PointerEventData): void {
    this.pointerPosition = event.position === null ? null : { ...event.position };
    this.pointerDown = event.down;
  }
}
