/**
 * Frame Pipeline Interfaces
 *
 * Contracts for the collaborators that sit outside the simulation core:
 * the renderer that turns draw commands into pixels and the audio backend
 * that turns audio commands into sound.
 *
 * Frame flow:
 *   host tick → fixed updates → draw commands + audio commands → consumers
 */

import type { Color } from "../color/color";
import type { AudioCommand } from "../commands/audio";
import type { DrawCommand } from "../commands/draw";

// ============================================================================
// Renderer
// ============================================================================

/**
 * Renderer that draws one frame of commands.
 *
 * Commands arrive sorted back to front. The array is frozen and only valid
 * for the duration of the call.
 */
export interface DrawCommandConsumer {
  id: string;
  render(commands: readonly DrawCommand[], backgroundColor: Color): void;
}

// ============================================================================
// Audio backend
// ============================================================================

/**
 * Audio backend that owns playback state.
 *
 * Receives each frame's commands exactly once, in emission order.
 */
export interface AudioCommandConsumer {
  id: string;
  process(commands: readonly AudioCommand[]): void;
}
