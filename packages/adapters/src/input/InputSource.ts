/**
 * Abstraction over keyboard and pointer event sources for dependency
 * injection. Lets the adapter run without a browser or window system.
 */

import type { Vec2 } from "@kinetica/contracts";

export interface KeyEventData {
  /** Physical key code, e.g. "KeyW", "ArrowUp", "Space" */
  code: string;
  pressed: boolean;
}

export interface PointerEventData {
  /** View coordinates, null when the pointer left the view */
  position: Vec2 | null;
  down: boolean;
}

export interface InputSource {
  /**
   * Subscribe to key presses and releases.
   * Returns an unsubscribe function.
   */
  onKey(callback: (event: KeyEventData) => void): () => void;

  /**
   * Subscribe to pointer moves, presses and releases.
   * Returns an unsubscribe function.
   */
  onPointer(callback: (event: PointerEventData) => void): () => void;

  /**
   * Clean up resources.
   */
  dispose?(): void;
}
