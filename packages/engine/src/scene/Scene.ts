import type {
  Color,
  Constraint,
  Diagnostic,
  DrawCommand,
  InputState,
  NodeId,
  Rect,
  Seconds,
  SimSeconds,
  Size,
  Vec2,
} from "@kinetica/contracts";
import { BLACK, createInputState } from "@kinetica/contracts";
import { AudioSystem } from "../audio/AudioSystem";
import { CommandBuffer } from "../commands/CommandBuffer";
import { applyConstraints } from "../constraints/applyConstraints";
import { Node } from "./Node";
import { ROOT_WORLD, composeWorld } from "./transforms";
import type { WorldState } from "./transforms";

/**
 * How the scene's size maps onto the view it is shown in.
 * - fill: stretch each axis independently
 * - aspectFit: uniform scale, whole scene visible
 * - aspectFill: uniform scale, view fully covered
 * - resizeFill: one view unit per scene unit
 */
export type ScaleMode = "fill" | "aspectFit" | "aspectFill" | "resizeFill";

/**
 * Configuration for a scene.
 */
export interface SceneConfig {
  /**
   * Logical size in scene units.
   * @default 800×600
   */
  size?: Size;

  /**
   * Where the scene origin sits within the viewport, normalized.
   * @default (0.5, 0.5)
   */
  anchorPoint?: Vec2;

  /** @default opaque black */
  backgroundColor?: Color;

  /** @default "aspectFit" */
  scaleMode?: ScaleMode;

  /** @default null */
  name?: string | null;

  /**
   * Diagnostics kept while nobody drains them. Older records are dropped
   * first.
   * @default 256
   */
  maxPendingDiagnostics?: number;
}

const DEFAULT_CONFIG: Required<SceneConfig> = {
  size: { width: 800, height: 600 },
  anchorPoint: { x: 0.5, y: 0.5 },
  backgroundColor: BLACK,
  scaleMode: "aspectFit",
  name: null,
  maxPendingDiagnostics: 256,
};

/**
 * Optional hook object. A method present here runs instead of the scene's
 * own hook of the same name.
 */
export interface SceneDelegate {
  sceneDidLoad?(scene: Scene): void;
  update?(dt: Seconds, scene: Scene): void;
  didEvaluateActions?(scene: Scene): void;
  didSimulatePhysics?(scene: Scene): void;
  didApplyConstraints?(scene: Scene): void;
  didFinishUpdate?(scene: Scene): void;
  didChangeSize?(oldSize: Size, scene: Scene): void;
}

/**
 * External physics collaborator, stepped once per fixed update between user
 * logic and constraints.
 */
export interface PhysicsStepper {
  simulate(dt: Seconds, scene: Scene): void;
}

export type DiagnosticInput = Omit<Diagnostic, "timestamp">;

/**
 * Root of a node tree.
 *
 * Owns the per-scene services (audio queue, current input, node registry,
 * diagnostics) and runs the fixed-step update stages in order.
 */
export class Scene extends Node {
  size: Size;
  backgroundColor: Color;
  scaleMode: ScaleMode;

  isPaused = false;
  input: InputState = createInputState();
  readonly audio = new AudioSystem();

  delegate: SceneDelegate | null = null;
  physics: PhysicsStepper | null = null;

  private time: SimSeconds = 0;
  private loaded = false;
  private readonly registry = new Map<NodeId, Node>();
  private readonly diagnostics: CommandBuffer<Diagnostic>;
  private readonly unresolvedConstraints = new WeakSet<Constraint>();

  constructor(config: SceneConfig = {}) {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    super(resolved.name);
    this.size = { ...resolved.size };
    this.anchorPoint = { ...resolved.anchorPoint };
    this.backgroundColor = { ...resolved.backgroundColor };
    this.scaleMode = resolved.scaleMode;
    this.diagnostics = new CommandBuffer<Diagnostic>(resolved.maxPendingDiagnostics);
    this.propagateScene(this);
  }

  override get isSceneRoot(): boolean {
    return true;
  }

  get currentTime(): SimSeconds {
    return this.time;
  }

  resetTime(): void {
    this.time = 0;
  }

  // === Node registry ===

  /** Called by nodes as they join this scene's tree. */
  registerNode(node: Node): void {
    if (!node.isDestroyed) {
      this.registry.set(node.id, node);
    }
  }

  unregisterNode(node: Node): void {
    this.registry.delete(node.id);
  }

  /** The live node with this id in this scene, if any. */
  nodeById(id: NodeId): Node | null {
    const node = this.registry.get(id);
    return node === undefined || node.isDestroyed ? null : node;
  }

  get nodeCount(): number {
    return this.registry.size;
  }

  // === Diagnostics ===

  reportDiagnostic(diagnostic: DiagnosticInput): void {
    this.diagnostics.append({ ...diagnostic, timestamp: this.time });
  }

  consumeDiagnostics(): readonly Diagnostic[] {
    return this.diagnostics.drain();
  }

  /** Records a constraint whose target did not resolve; reported once until it resolves again. */
  noteUnresolvedTarget(constraint: Constraint, node: Node): void {
    if (this.unresolvedConstraints.has(constraint)) return;
    this.unresolvedConstraints.add(constraint);
    this.reportDiagnostic({
      id: `constraint-unresolved-${node.id}-${constraint.kind}`,
      category: "constraint",
      severity: "warning",
      message: `${constraint.kind} constraint on ${node.id} has no live target`,
      source: "constraints",
      nodeId: node.id,
      persistence: "sticky",
    });
  }

  noteResolvedTarget(constraint: Constraint): void {
    this.unresolvedConstraints.delete(constraint);
  }

  // === Lifecycle hooks ===

  /** Runs sceneDidLoad the first time the scene is presented. */
  load(): void {
    if (this.loaded) return;
    this.loaded = true;
    if (this.delegate?.sceneDidLoad) {
      this.delegate.sceneDidLoad(this);
    } else {
      this.sceneDidLoad();
    }
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  sceneDidLoad(): void {}

  didEvaluateActions(): void {}

  didSimulatePhysics(): void {}

  didApplyConstraints(): void {}

  didFinishUpdate(): void {}

  didChangeSize(_oldSize: Size): void {}

  resize(size: Size): void {
    const oldSize = this.size;
    this.size = { ...size };
    if (this.delegate?.didChangeSize) {
      this.delegate.didChangeSize(oldSize, this);
    } else {
      this.didChangeSize(oldSize);
    }
  }

  // === Frame processing ===

  /**
   * Runs one fixed step:
   * user logic, physics, constraints, warp animations, then didFinishUpdate.
   */
  processFrame(dt: Seconds): void {
    if (this.isPaused) return;

    this.time += dt;

    const delegate = this.delegate;

    // User logic
    if (delegate?.update) {
      delegate.update(dt, this);
    } else {
      this.update(dt);
    }
    this.enumerateDescendants((node) => node.update(dt));
    if (delegate?.didEvaluateActions) {
      delegate.didEvaluateActions(this);
    } else {
      this.didEvaluateActions();
    }

    // Physics
    this.physics?.simulate(dt, this);
    if (delegate?.didSimulatePhysics) {
      delegate.didSimulatePhysics(this);
    } else {
      this.didSimulatePhysics();
    }

    // Constraints
    applyConstraints(this);
    this.enumerateDescendants((node) => applyConstraints(node));
    if (delegate?.didApplyConstraints) {
      delegate.didApplyConstraints(this);
    } else {
      this.didApplyConstraints();
    }

    // Warps
    this.advanceWarpAnimation(dt);
    this.enumerateDescendants((node) => node.advanceWarpAnimation(dt));

    if (delegate?.didFinishUpdate) {
      delegate.didFinishUpdate(this);
    } else {
      this.didFinishUpdate();
    }
  }

  // === Draw commands ===

  /**
   * One command per visible sprite, ordered by zPosition. Sprites with equal
   * zPosition keep their traversal order.
   */
  generateDrawCommands(): readonly DrawCommand[] {
    const commands: DrawCommand[] = [];
    this.collectDrawCommands(this, ROOT_WORLD, commands);
    commands.sort((a, b) => a.zPosition - b.zPosition);
    return Object.freeze(commands);
  }

  private collectDrawCommands(node: Node, parentWorld: WorldState, into: DrawCommand[]): void {
    if (node.isHidden) return;

    const world = composeWorld(parentWorld, node);
    // Alpha multiplies down the tree, so nothing below is visible either
    if (world.alpha <= 0) return;

    const command = node.makeDrawCommand(world);
    if (command !== null) into.push(command);

    for (const child of node.children) {
      this.collectDrawCommands(child, world, into);
    }
  }

  // === Viewport ===

  /** The visible area in scene coordinates. */
  calculateViewport(): Rect {
    return {
      x: -this.size.width * this.anchorPoint.x,
      y: -this.size.height * this.anchorPoint.y,
      width: this.size.width,
      height: this.size.height,
    };
  }

  /** Scene units per view unit on each axis. */
  private viewToSceneScale(viewSize: Size): Size {
    switch (this.scaleMode) {
      case "fill":
        return {
          width: this.size.width / viewSize.width,
          height: this.size.height / viewSize.height,
        };
      case "aspectFit": {
        const factor = Math.min(viewSize.width / this.size.width, viewSize.height / this.size.height);
        return { width: 1 / factor, height: 1 / factor };
      }
      case "aspectFill": {
        const factor = Math.max(viewSize.width / this.size.width, viewSize.height / this.size.height);
        return { width: 1 / factor, height: 1 / factor };
      }
      case "resizeFill":
        return { width: 1, height: 1 };
    }
  }

  convertPointFromView(point: Vec2, viewSize: Size): Vec2 {
    const factor = this.viewToSceneScale(viewSize);
    return {
      x: (point.x - viewSize.width / 2) * factor.width + this.size.width * this.anchorPoint.x,
      y: (point.y - viewSize.height / 2) * factor.height + this.size.height * this.anchorPoint.y,
    };
  }

  convertPointToView(point: Vec2, viewSize: Size): Vec2 {
    const factor = this.viewToSceneScale(viewSize);
    return {
      x: (point.x - this.size.width * this.anchorPoint.x) / factor.width + viewSize.width / 2,
      y: (point.y - this.size.height * this.anchorPoint.y) / factor.height + viewSize.height / 2,
    };
  }
}
