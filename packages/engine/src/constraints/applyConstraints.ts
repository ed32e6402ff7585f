/**
 * Constraint application.
 *
 * Constraints run in list order and mutate the node's local transform in
 * place; each one sees what the previous one left. There is no second pass.
 */

import type {
  Constraint,
  DistanceConstraint,
  NodeId,
  Vec2,
} from "@kinetica/contracts";
import { clampPoint } from "../math/rect";
import { clampToRange } from "../math/range";
import { add, bearing, length, scaleVec, subtract } from "../math/vector";
import type { Node } from "../scene/Node";

/**
 * Looks up a constraint target through the node's scene. A target that is
 * not in the same scene, or that has been destroyed, does not resolve.
 */
function resolveTarget(node: Node, constraint: Constraint, target: NodeId): Node | null {
  const scene = node.scene;
  if (scene === null) return null;

  const resolved = scene.nodeById(target);
  if (resolved === null) {
    scene.noteUnresolvedTarget(constraint, node);
    return null;
  }
  scene.noteResolvedTarget(constraint);
  return resolved;
}

function applyDistance(node: Node, constraint: DistanceConstraint): void {
  const target = resolveTarget(node, constraint, constraint.target);
  if (target === null) return;

  const targetWorld = target.worldPosition;
  const nodeWorld = node.worldPosition;
  const offset = subtract(nodeWorld, targetWorld);
  const current = length(offset);
  if (current === 0) return;

  const clamped = clampToRange(constraint.range, current);
  if (clamped === current) return;

  const desired = add(targetWorld, scaleVec(offset, clamped / current));
  node.position = add(node.position, subtract(desired, nodeWorld));
}

function orientToward(node: Node, point: Vec2, offset: number): void {
  node.rotation = bearing(node.worldPosition, point) + offset;
}

export function applyConstraint(node: Node, constraint: Constraint): void {
  switch (constraint.kind) {
    case "positionX":
      node.position = {
        x: clampToRange(constraint.range, node.position.x),
        y: node.position.y,
      };
      break;

    case "positionY":
      node.position = {
        x: node.position.x,
        y: clampToRange(constraint.range, node.position.y),
      };
      break;

    case "positionInRect":
      node.position = clampPoint(constraint.rect, node.position);
      break;

    case "distance":
      applyDistance(node, constraint);
      break;

    case "rotation":
      node.rotation = clampToRange(constraint.range, node.rotation);
      break;

    case "orientToNode": {
      const target = resolveTarget(node, constraint, constraint.target);
      if (target !== null) {
        orientToward(node, target.worldPosition, constraint.offset);
      }
      break;
    }

    case "orientToPoint":
      orientToward(node, constraint.point, constraint.offset);
      break;
  }
}

/** Applies the node's enabled constraints in order. */
export function applyConstraints(node: Node): void {
  const constraints = node.constraints;
  if (constraints === null) return;

  for (const constraint of constraints) {
    if (constraint.enabled) {
      applyConstraint(node, constraint);
    }
  }
}
