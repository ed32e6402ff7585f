/**
 * Constraint constructors. Constraints are plain records; these only fill in
 * the tag and the enabled flag.
 */

import type {
  Constraint,
  DistanceConstraint,
  OrientToNodeConstraint,
  OrientToPointConstraint,
  PositionInRectConstraint,
  PositionXConstraint,
  PositionYConstraint,
  Range,
  Rect,
  RotationConstraint,
  Vec2,
} from "@kinetica/contracts";
import { rangeDegrees } from "../math/range";
import type { Node } from "../scene/Node";

export function positionX(range: Range): PositionXConstraint {
  return { kind: "positionX", range, enabled: true };
}

export function positionY(range: Range): PositionYConstraint {
  return { kind: "positionY", range, enabled: true };
}

export function positionInRect(rect: Rect): PositionInRectConstraint {
  return { kind: "positionInRect", rect, enabled: true };
}

/** Holds the world-space distance to `node` inside `range`. */
export function distanceTo(range: Range, node: Node): DistanceConstraint {
  return { kind: "distance", range, target: node.id, enabled: true };
}

/** Range in radians. */
export function rotation(range: Range): RotationConstraint {
  return { kind: "rotation", range, enabled: true };
}

export function rotationDegrees(range: Range): RotationConstraint {
  return rotation(rangeDegrees(range));
}

export function orientToNode(node: Node, offset = 0): OrientToNodeConstraint {
  return { kind: "orientToNode", target: node.id, offset, enabled: true };
}

export function orientToPoint(point: Vec2, offset = 0): OrientToPointConstraint {
  return { kind: "orientToPoint", point, offset, enabled: true };
}

/** Toggles a constraint in place; it takes effect on the next application. */
export function setConstraintEnabled(constraint: Constraint, enabled: boolean): void {
  constraint.enabled = enabled;
}
