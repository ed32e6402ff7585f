import type { Range, Rect, Vec2 } from "../geometry/geometry";

/**
 * Opaque node handle. Ids are never reused, so a stale id simply stops
 * resolving once its node is destroyed.
 */
export type NodeId = string;

export type ConstraintKind =
  | "positionX"
  | "positionY"
  | "positionInRect"
  | "distance"
  | "rotation"
  | "orientToNode"
  | "orientToPoint";

interface ConstraintBase {
  kind: ConstraintKind;
  /** Disabled constraints are skipped during application */
  enabled: boolean;
}

export interface PositionXConstraint extends ConstraintBase {
  kind: "positionX";
  range: Range;
}

export interface PositionYConstraint extends ConstraintBase {
  kind: "positionY";
  range: Range;
}

export interface PositionInRectConstraint extends ConstraintBase {
  kind: "positionInRect";
  rect: Rect;
}

/**
 * Keeps the world-space distance to another node inside a range.
 * The target is a non-owning reference.
 */
export interface DistanceConstraint extends ConstraintBase {
  kind: "distance";
  range: Range;
  target: NodeId;
}

/** Limits local rotation, in radians */
export interface RotationConstraint extends ConstraintBase {
  kind: "rotation";
  range: Range;
}

export interface OrientToNodeConstraint extends ConstraintBase {
  kind: "orientToNode";
  target: NodeId;
  /** Angular offset added to the bearing, in radians */
  offset: number;
}

/** Faces a fixed point given in scene coordinates */
export interface OrientToPointConstraint extends ConstraintBase {
  kind: "orientToPoint";
  point: Vec2;
  offset: number;
}

export type Constraint =
  | PositionXConstraint
  | PositionYConstraint
  | PositionInRectConstraint
  | DistanceConstraint
  | RotationConstraint
  | OrientToNodeConstraint
  | OrientToPointConstraint;
