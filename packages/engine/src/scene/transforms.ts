/**
 * World-transform composition.
 *
 * Both the per-node world getters and the draw traversal go through
 * composeWorld, so a node's world state is bit-identical whichever way it
 * is computed.
 */

import type { AffineTransform, Size, Vec2 } from "@kinetica/contracts";
import { IDENTITY, applyToPoint, concat, rotated, scaled, translationTransform } from "../math/affine";

/** The local transform fields of a node. */
export interface LocalTransform {
  position: Vec2;
  rotation: number;
  scale: Size;
  alpha: number;
}

/** A node's fully composed state in scene space. */
export interface WorldState {
  matrix: AffineTransform;
  position: Vec2;
  rotation: number;
  scale: Size;
  alpha: number;
}

export const ROOT_WORLD: Readonly<WorldState> = Object.freeze({
  matrix: IDENTITY,
  position: { x: 0, y: 0 },
  rotation: 0,
  scale: { width: 1, height: 1 },
  alpha: 1,
});

/** translate(position) · rotate(rotation) · scale(scale) */
export function localMatrix(local: LocalTransform): AffineTransform {
  const t = translationTransform(local.position.x, local.position.y);
  return scaled(rotated(t, local.rotation), local.scale.width, local.scale.height);
}

export function composeWorld(parent: WorldState, local: LocalTransform): WorldState {
  return {
    matrix: concat(parent.matrix, localMatrix(local)),
    position: applyToPoint(parent.matrix, local.position),
    rotation: parent.rotation + local.rotation,
    scale: {
      width: parent.scale.width * local.scale.width,
      height: parent.scale.height * local.scale.height,
    },
    alpha: parent.alpha * local.alpha,
  };
}
