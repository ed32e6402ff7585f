/**
 * Fixed-stride binary encoding of draw commands for hosts that move them
 * across a worker or native boundary.
 *
 * Layout per command (float32):
 *   0-1   worldPosition x, y
 *   2     worldRotation
 *   3-4   worldScale width, height
 *   5-6   size width, height
 *   7-8   anchorPoint x, y
 *   9     textureId
 *   10-13 textureRect x, y, width, height
 *   14    filteringMode (0 nearest, 1 linear)
 *   15    usesMipmaps (0 or 1)
 *   16-19 color red, green, blue, alpha
 *   20    alpha
 *   21    zPosition
 *
 * Warp snapshots, attributes, blend mode and centerRect are not packed.
 */

import type { DrawCommand } from "@kinetica/contracts";

export const DRAW_COMMAND_STRIDE = 22;

export function packDrawCommands(commands: readonly DrawCommand[]): Float32Array {
  const out = new Float32Array(commands.length * DRAW_COMMAND_STRIDE);
  commands.forEach((c, i) => {
    const o = i * DRAW_COMMAND_STRIDE;
    out[o] = c.worldPosition.x;
    out[o + 1] = c.worldPosition.y;
    out[o + 2] = c.worldRotation;
    out[o + 3] = c.worldScale.width;
    out[o + 4] = c.worldScale.height;
    out[o + 5] = c.size.width;
    out[o + 6] = c.size.height;
    out[o + 7] = c.anchorPoint.x;
    out[o + 8] = c.anchorPoint.y;
    out[o + 9] = c.textureId;
    out[o + 10] = c.textureRect.x;
    out[o + 11] = c.textureRect.y;
    out[o + 12] = c.textureRect.width;
    out[o + 13] = c.textureRect.height;
    out[o + 14] = c.filteringMode === "nearest" ? 0 : 1;
    out[o + 15] = c.usesMipmaps ? 1 : 0;
    out[o + 16] = c.color.red;
    out[o + 17] = c.color.green;
    out[o + 18] = c.color.blue;
    out[o + 19] = c.color.alpha;
    out[o + 20] = c.alpha;
    out[o + 21] = c.zPosition;
  });
  return out;
}
