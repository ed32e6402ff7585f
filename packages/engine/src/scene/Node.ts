/**
 * Scene graph node.
 *
 * A node owns its children; its parent and scene links are back references
 * only. Each node has an id that is never reused, which is how constraints
 * refer to other nodes without keeping them alive.
 */

import type {
  AffineTransform,
  Constraint,
  DrawCommand,
  NodeId,
  Rect,
  Seconds,
  Size,
  Vec2,
} from "@kinetica/contracts";
import { applyToPoint, invert } from "../math/affine";
import { union } from "../math/rect";
import type { WarpAnimation } from "../warp/WarpAnimation";
import type { WarpGeometryGrid } from "../warp/WarpGeometryGrid";
import type { Scene } from "./Scene";
import type { LocalTransform, WorldState } from "./transforms";
import { ROOT_WORLD, composeWorld, localMatrix } from "./transforms";

/** Opaque handle into an external physics world. */
export type PhysicsBodyHandle = number | string;

/**
 * Counter for generating node ids.
 */
let nodeCounter = 0;

function createNodeId(): NodeId {
  nodeCounter += 1;
  return `node-${nodeCounter}`;
}

export class Node implements LocalTransform {
  readonly id: NodeId = createNodeId();
  name: string | null = null;

  // Spatial
  position: Vec2 = { x: 0, y: 0 };
  /** Radians, counter-clockwise */
  rotation = 0;
  scale: Size = { width: 1, height: 1 };
  /** Normalized pivot within the node's bounds */
  anchorPoint: Vec2 = { x: 0.5, y: 0.5 };
  zPosition = 0;

  // Appearance
  alpha = 1;
  isHidden = false;

  constraints: Constraint[] | null = null;

  warpGeometry: WarpGeometryGrid | null = null;
  subdivisionLevels = 0;

  physicsBody: PhysicsBodyHandle | null = null;

  private childList: Node[] = [];
  private parentNode: Node | null = null;
  private sceneRef: Scene | null = null;
  private destroyed = false;
  private activeWarpAnimation: WarpAnimation | null = null;

  constructor(name: string | null = null) {
    this.name = name;
  }

  // === Hierarchy ===

  get children(): readonly Node[] {
    return this.childList;
  }

  get parent(): Node | null {
    return this.parentNode;
  }

  get scene(): Scene | null {
    return this.sceneRef;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** True for scene roots, which can never become children. */
  get isSceneRoot(): boolean {
    return false;
  }

  /**
   * Appends a child. A node that already has a parent moves here.
   * Returns false, changing nothing, when the move would create a cycle or
   * either node is destroyed.
   */
  addChild(node: Node): boolean {
    return this.insertChild(node, this.childList.length);
  }

  /** Inserts a child at `index`, clamped to the valid range. */
  insertChild(node: Node, index: number): boolean {
    if (!this.canAdopt(node)) {
      this.sceneRef?.reportDiagnostic({
        id: `hierarchy-rejected-${node.id}-${this.id}`,
        category: "hierarchy",
        severity: "warning",
        message: `Cannot add ${node.id} under ${this.id}`,
        source: "node",
        nodeId: node.id,
        persistence: "transient",
      });
      return false;
    }

    node.removeFromParent();

    const at = Number.isFinite(index)
      ? Math.max(0, Math.min(this.childList.length, Math.floor(index)))
      : this.childList.length;
    this.childList.splice(at, 0, node);
    node.parentNode = this;
    node.propagateScene(this.sceneRef);
    return true;
  }

  removeFromParent(): void {
    const parent = this.parentNode;
    if (parent === null) return;

    const index = parent.childList.indexOf(this);
    if (index >= 0) parent.childList.splice(index, 1);
    this.parentNode = null;
    this.propagateScene(null);
  }

  removeAllChildren(): void {
    const removed = this.childList;
    this.childList = [];
    for (const child of removed) {
      child.parentNode = null;
      child.propagateScene(null);
    }
  }

  /**
   * Detaches the node and permanently retires it and its subtree. Destroyed
   * nodes never resolve as constraint targets again and cannot be re-added.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.removeFromParent();
    this.retire();
  }

  /** Whether this node is `node` or one of its ancestors. */
  isAncestorOf(node: Node): boolean {
    let current: Node | null = node;
    while (current !== null) {
      if (current === this) return true;
      current = current.parentNode;
    }
    return false;
  }

  private canAdopt(node: Node): boolean {
    if (this.destroyed || node.destroyed) return false;
    if (node.isSceneRoot) return false;
    return !node.isAncestorOf(this);
  }

  private retire(): void {
    this.destroyed = true;
    this.activeWarpAnimation = null;
    const children = this.childList;
    this.childList = [];
    for (const child of children) {
      child.parentNode = null;
      child.retire();
    }
  }

  /** Sets the scene on this subtree and keeps the scene's registry in step. */
  protected propagateScene(scene: Scene | null): void {
    const previous = this.sceneRef;
    if (previous !== scene) {
      previous?.unregisterNode(this);
      this.sceneRef = scene;
      scene?.registerNode(this);
      this.didMoveToScene(scene);
    }
    for (const child of this.childList) {
      child.propagateScene(scene);
    }
  }

  /** Called after the node joins or leaves a scene. */
  protected didMoveToScene(_scene: Scene | null): void {}

  // === Searching ===

  childNode(name: string): Node | null {
    return this.childList.find((child) => child.name === name) ?? null;
  }

  /**
   * Visits matching nodes:
   * - "*" every direct child
   * - "//name" every descendant with that name
   * - "name" every direct child with that name
   */
  enumerateChildNodes(name: string, visit: (node: Node) => void): void {
    if (name === "*") {
      for (const child of [...this.childList]) visit(child);
    } else if (name.startsWith("//")) {
      const searchName = name.slice(2);
      this.enumerateDescendants((node) => {
        if (node.name === searchName) visit(node);
      });
    } else {
      for (const child of [...this.childList]) {
        if (child.name === name) visit(child);
      }
    }
  }

  /** Depth-first, in child order. */
  enumerateDescendants(visit: (node: Node) => void): void {
    for (const child of [...this.childList]) {
      visit(child);
      child.enumerateDescendants(visit);
    }
  }

  // === Transforms ===

  get localTransform(): AffineTransform {
    return localMatrix(this);
  }

  get worldState(): WorldState {
    const parentWorld = this.parentNode === null ? ROOT_WORLD : this.parentNode.worldState;
    return composeWorld(parentWorld, this);
  }

  get worldTransform(): AffineTransform {
    return this.worldState.matrix;
  }

  get worldPosition(): Vec2 {
    return this.worldState.position;
  }

  get worldRotation(): number {
    return this.worldState.rotation;
  }

  get worldScale(): Size {
    return this.worldState.scale;
  }

  get worldAlpha(): number {
    return this.worldState.alpha;
  }

  /** Maps a point in `node`'s local space into this node's local space. */
  convertPointFrom(point: Vec2, node: Node): Vec2 {
    const worldPoint = applyToPoint(node.worldTransform, point);
    const inverse = invert(this.worldTransform);
    return inverse === null ? worldPoint : applyToPoint(inverse, worldPoint);
  }

  convertPointTo(point: Vec2, node: Node): Vec2 {
    return node.convertPointFrom(point, this);
  }

  // === Bounds ===

  /** Bounds in the parent's coordinate space. Plain nodes have no extent. */
  get frame(): Rect {
    return { x: this.position.x, y: this.position.y, width: 0, height: 0 };
  }

  /** Union of this frame and every descendant's, offset by this position. */
  calculateAccumulatedFrame(): Rect {
    let result = this.frame;
    for (const child of this.childList) {
      const childFrame = child.calculateAccumulatedFrame();
      result = union(result, {
        x: this.position.x + childFrame.x,
        y: this.position.y + childFrame.y,
        width: childFrame.width,
        height: childFrame.height,
      });
    }
    return result;
  }

  // === Warp animation ===

  get warpAnimation(): WarpAnimation | null {
    return this.activeWarpAnimation;
  }

  /** Replaces any running warp animation. */
  runWarpAnimation(animation: WarpAnimation): void {
    if (this.destroyed) return;
    this.activeWarpAnimation = animation;
  }

  removeWarpAnimation(): void {
    this.activeWarpAnimation = null;
  }

  /** Advances the running warp animation and drops it once finished. */
  advanceWarpAnimation(dt: Seconds): void {
    const animation = this.activeWarpAnimation;
    if (animation === null) return;
    if (animation.advance(this, dt)) {
      // The animation may have been replaced while it ran
      if (this.activeWarpAnimation === animation) {
        this.activeWarpAnimation = null;
      }
    }
  }

  // === Update cycle ===

  /** Per-step user logic. The base implementation does nothing. */
  update(_dt: Seconds): void {}

  /**
   * Draw command for this node alone, given its composed world state.
   * Plain nodes are not drawn.
   */
  makeDrawCommand(_world: WorldState): DrawCommand | null {
    return null;
  }

  toString(): string {
    const label = this.name === null ? "unnamed" : `"${this.name}"`;
    return `${this.constructor.name}(${label}, pos: (${this.position.x}, ${this.position.y}), children: ${this.childList.length})`;
  }
}
