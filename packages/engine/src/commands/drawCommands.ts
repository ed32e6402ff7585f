import type { DrawCommand, Rect, Size } from "@kinetica/contracts";

/** size × worldScale */
export function renderedSize(command: DrawCommand): Size {
  return {
    width: command.size.width * command.worldScale.width,
    height: command.size.height * command.worldScale.height,
  };
}

/**
 * World-space rect of the quad before rotation, placed by its anchor point.
 */
export function drawCommandBounds(command: DrawCommand): Rect {
  const finalSize = renderedSize(command);
  return {
    x: command.worldPosition.x - finalSize.width * command.anchorPoint.x,
    y: command.worldPosition.y - finalSize.height * command.anchorPoint.y,
    width: finalSize.width,
    height: finalSize.height,
  };
}

export function describeDrawCommand(command: DrawCommand): string {
  const { x, y } = command.worldPosition;
  return `DrawCommand(pos: (${x}, ${y}), size: ${command.size.width}x${command.size.height}, texture: ${command.textureId}, z: ${command.zPosition})`;
}
