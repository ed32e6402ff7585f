import { describe, it, expect, beforeEach } from "vitest";
import type { Seconds, Size } from "@kinetica/contracts";
import { positionX } from "../../src/constraints/factories";
import { rangeOf } from "../../src/math/range";
import { Node } from "../../src/scene/Node";
import type { PhysicsStepper, SceneDelegate } from "../../src/scene/Scene";
import { Scene } from "../../src/scene/Scene";
import { SpriteNode } from "../../src/scene/SpriteNode";
import { WarpGeometryGrid } from "../../src/warp/WarpGeometryGrid";
import { warpTo } from "../../src/warp/WarpAnimation";

/**
 * Records every hook call in order.
 */
class RecordingDelegate implements SceneDelegate {
  calls: string[] = [];

  update(dt: Seconds): void {
    this.calls.push(`update:${dt}`);
  }
  didEvaluateActions(): void {
    this.calls.push("didEvaluateActions");
  }
  didSimulatePhysics(): void {
    this.calls.push("didSimulatePhysics");
  }
  didApplyConstraints(): void {
    this.calls.push("didApplyConstraints");
  }
  didFinishUpdate(): void {
    this.calls.push("didFinishUpdate");
  }
  didChangeSize(oldSize: Size): void {
    this.calls.push(`didChangeSize:${oldSize.width}x${oldSize.height}`);
  }
}

class RecordingPhysics implements PhysicsStepper {
  constructor(private readonly calls: string[]) {}

  simulate(dt: Seconds): void {
    this.calls.push(`physics:${dt}`);
  }
}

class RecordingNode extends Node {
  constructor(private readonly calls: string[], name: string) {
    super(name);
  }

  override update(): void {
    this.calls.push(`node:${this.name ?? ""}`);
  }
}

function sprite(z: number, name: string): SpriteNode {
  const node = new SpriteNode({ name, size: { width: 10, height: 10 } });
  node.zPosition = z;
  return node;
}

describe("Scene.processFrame", () => {
  let scene: Scene;
  let delegate: RecordingDelegate;

  beforeEach(() => {
    scene = new Scene();
    delegate = new RecordingDelegate();
    scene.delegate = delegate;
    scene.physics = new RecordingPhysics(delegate.calls);
  });

  it("runs the stages in order", () => {
    const parent = new RecordingNode(delegate.calls, "parent");
    parent.addChild(new RecordingNode(delegate.calls, "child"));
    scene.addChild(parent);
    scene.addChild(new RecordingNode(delegate.calls, "sibling"));

    scene.processFrame(0.5);

    expect(delegate.calls).toEqual([
      "update:0.5",
      "node:parent",
      "node:child",
      "node:sibling",
      "didEvaluateActions",
      "physics:0.5",
      "didSimulatePhysics",
      "didApplyConstraints",
      "didFinishUpdate",
    ]);
    expect(scene.currentTime).toBe(0.5);
  });

  it("applies constraints after user logic", () => {
    const node = new Node();
    node.constraints = [positionX(rangeOf(0, 10))];
    scene.addChild(node);
    scene.delegate = {
      update: () => {
        node.position = { x: 50, y: 0 };
      },
    };

    scene.processFrame(1 / 60);

    expect(node.position.x).toBe(10);
  });

  it("advances warp animations", () => {
    const node = new SpriteNode();
    scene.addChild(node);
    const target = new WarpGeometryGrid(1, 1);
    target.setDestinationPosition(0, { x: -1, y: 0 });
    node.runWarpAnimation(warpTo(target, 0.5));

    scene.processFrame(0.25);
    expect(node.warpGeometry?.destinationPosition(0)).toEqual({ x: -0.5, y: 0 });
  });

  it("does nothing while paused", () => {
    scene.isPaused = true;
    scene.processFrame(0.5);
    expect(delegate.calls).toEqual([]);
    expect(scene.currentTime).toBe(0);
  });

  it("calls the scene's own hooks when there is no delegate", () => {
    const calls: string[] = [];
    class HookedScene extends Scene {
      override update(): void {
        calls.push("update");
      }
      override didFinishUpdate(): void {
        calls.push("didFinishUpdate");
      }
    }
    const hooked = new HookedScene();

    hooked.processFrame(0.1);

    expect(calls).toEqual(["update", "didFinishUpdate"]);
  });

  it("reports size changes", () => {
    scene.resize({ width: 1024, height: 768 });
    expect(delegate.calls).toEqual(["didChangeSize:800x600"]);
    expect(scene.size).toEqual({ width: 1024, height: 768 });
  });
});

describe("Scene.load", () => {
  it("runs sceneDidLoad only once", () => {
    let loads = 0;
    class LoadingScene extends Scene {
      override sceneDidLoad(): void {
        loads += 1;
      }
    }
    const scene = new LoadingScene();
    scene.load();
    scene.load();
    expect(loads).toBe(1);
    expect(scene.isLoaded).toBe(true);
  });
});

describe("Scene.generateDrawCommands", () => {
  let scene: Scene;

  beforeEach(() => {
    scene = new Scene();
  });

  it("orders by zPosition", () => {
    scene.addChild(sprite(3, "a"));
    scene.addChild(sprite(1, "b"));
    scene.addChild(sprite(2, "c"));

    const commands = scene.generateDrawCommands();

    expect(commands.map((c) => c.zPosition)).toEqual([1, 2, 3]);
  });

  it("keeps traversal order for equal zPosition", () => {
    const first = sprite(0, "first");
    first.position = { x: 1, y: 0 };
    const second = sprite(0, "second");
    second.position = { x: 2, y: 0 };
    const third = sprite(0, "third");
    third.position = { x: 5, y: 0 };
    first.addChild(second);
    scene.addChild(first);
    scene.addChild(third);

    const xs = scene.generateDrawCommands().map((c) => c.worldPosition.x);

    expect(xs).toEqual([1, 3, 5]);
  });

  it("skips hidden nodes and their subtrees", () => {
    const hidden = sprite(0, "hidden");
    hidden.isHidden = true;
    hidden.addChild(sprite(0, "under-hidden"));
    scene.addChild(hidden);
    scene.addChild(sprite(0, "visible"));

    expect(scene.generateDrawCommands()).toHaveLength(1);
  });

  it("elides transparent nodes and everything below them", () => {
    const group = new Node();
    group.alpha = 0;
    group.addChild(sprite(0, "inside"));
    scene.addChild(group);
    const faded = sprite(0, "faded");
    faded.alpha = 0.5;
    faded.addChild(sprite(0, "inner"));
    scene.addChild(faded);

    const commands = scene.generateDrawCommands();

    expect(commands.map((c) => c.alpha)).toEqual([0.5, 0.5]);
  });

  it("emits no commands for plain nodes", () => {
    scene.addChild(new Node());
    expect(scene.generateDrawCommands()).toEqual([]);
  });

  it("matches the world getters exactly", () => {
    const parent = new Node();
    parent.position = { x: 13.7, y: -4.2 };
    parent.rotation = 0.3;
    parent.scale = { width: 1.5, height: 0.75 };
    parent.alpha = 0.8;
    const child = sprite(0, "child");
    child.position = { x: 2.1, y: 9.9 };
    child.rotation = -1.1;
    child.alpha = 0.6;
    parent.addChild(child);
    scene.addChild(parent);

    const [command] = scene.generateDrawCommands();

    expect(command?.worldPosition).toEqual(child.worldPosition);
    expect(command?.worldRotation).toBe(child.worldRotation);
    expect(command?.worldScale).toEqual(child.worldScale);
    expect(command?.alpha).toBe(child.worldAlpha);
  });

  it("returns a frozen array", () => {
    scene.addChild(sprite(0, "a"));
    expect(Object.isFrozen(scene.generateDrawCommands())).toBe(true);
  });
});

describe("Scene viewport", () => {
  it("places the viewport by the anchor point", () => {
    const scene = new Scene({ size: { width: 800, height: 600 } });
    expect(scene.calculateViewport()).toEqual({ x: -400, y: -300, width: 800, height: 600 });

    const corner = new Scene({ size: { width: 800, height: 600 }, anchorPoint: { x: 0, y: 0 } });
    expect(corner.calculateViewport()).toEqual({ x: -0, y: -0, width: 800, height: 600 });
  });

  it("maps the view center to size × anchorPoint", () => {
    const scene = new Scene({ size: { width: 800, height: 600 } });
    expect(scene.convertPointFromView({ x: 200, y: 150 }, { width: 400, height: 300 })).toEqual({
      x: 400,
      y: 300,
    });
  });

  it("stretches each axis in fill mode", () => {
    const scene = new Scene({ size: { width: 800, height: 600 }, scaleMode: "fill" });
    const view = { width: 400, height: 600 };
    expect(scene.convertPointFromView({ x: 300, y: 400 }, view)).toEqual({ x: 600, y: 400 });
    expect(scene.convertPointToView({ x: 600, y: 400 }, view)).toEqual({ x: 300, y: 400 });
  });

  it("uses the smaller ratio in aspectFit mode", () => {
    const scene = new Scene({ size: { width: 800, height: 600 }, scaleMode: "aspectFit" });
    // min(400/800, 600/600) = 0.5, so 2 scene units per view unit
    const p = scene.convertPointFromView({ x: 300, y: 300 }, { width: 400, height: 600 });
    expect(p).toEqual({ x: 600, y: 300 });
  });

  it("maps one to one in resizeFill mode", () => {
    const scene = new Scene({ size: { width: 800, height: 600 }, scaleMode: "resizeFill" });
    const p = scene.convertPointFromView({ x: 10, y: 20 }, { width: 100, height: 100 });
    expect(p).toEqual({ x: 360, y: 270 });
  });
});
