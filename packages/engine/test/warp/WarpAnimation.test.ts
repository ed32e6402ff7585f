import { describe, it, expect } from "vitest";
import { Node } from "../../src/scene/Node";
import { WarpGeometryGrid } from "../../src/warp/WarpGeometryGrid";
import { animateWithWarps, warpTo } from "../../src/warp/WarpAnimation";

function shiftedGrid(dx: number, columns = 2, rows = 2): WarpGeometryGrid {
  const grid = new WarpGeometryGrid(columns, rows);
  grid.setAllDestinationPositions(grid.allSourcePositions.map((p) => ({ x: p.x + dx, y: p.y })));
  return grid;
}

describe("warpTo", () => {
  it("reaches the target at the end of its duration and is then removed", () => {
    const node = new Node();
    const target = shiftedGrid(0.5);
    node.runWarpAnimation(warpTo(target, 1));

    for (let i = 0; i < 4; i++) node.advanceWarpAnimation(0.25);

    expect(node.warpGeometry?.allDestinationPositions).toEqual(target.allDestinationPositions);
    expect(node.warpAnimation).toBeNull();
  });

  it("starts from the identity grid when the node has none", () => {
    const node = new Node();
    node.runWarpAnimation(warpTo(shiftedGrid(0.5), 1));

    node.advanceWarpAnimation(0.5);

    expect(node.warpGeometry?.destinationPosition(0)).toEqual({ x: 0.25, y: 0 });
    expect(node.warpAnimation).not.toBeNull();
  });

  it("starts from the node's current grid", () => {
    const node = new Node();
    node.warpGeometry = shiftedGrid(0.5);
    node.runWarpAnimation(warpTo(new WarpGeometryGrid(2, 2), 1));

    node.advanceWarpAnimation(0.5);

    expect(node.warpGeometry?.destinationPosition(0)).toEqual({ x: 0.25, y: 0 });
  });

  it("leaves a grid of another shape untouched", () => {
    const node = new Node();
    const original = shiftedGrid(0.1, 3, 3);
    node.warpGeometry = original;
    node.runWarpAnimation(warpTo(shiftedGrid(0.5), 0.5));

    node.advanceWarpAnimation(0.5);

    expect(node.warpGeometry).toBe(original);
    expect(node.warpAnimation).toBeNull();
  });

  it("completes on the first step when the duration is zero", () => {
    const node = new Node();
    const target = shiftedGrid(0.5);
    node.runWarpAnimation(warpTo(target, 0));

    node.advanceWarpAnimation(0);

    expect(node.warpGeometry?.allDestinationPositions).toEqual(target.allDestinationPositions);
    expect(node.warpAnimation).toBeNull();
  });
});

describe("animateWithWarps", () => {
  it("steps through grids in equal slices", () => {
    const grids = [shiftedGrid(0.1), shiftedGrid(0.2), shiftedGrid(0.3)];
    const node = new Node();
    node.runWarpAnimation(animateWithWarps(grids, 3));

    const seen: number[] = [];
    for (let i = 0; i < 6; i++) {
      node.advanceWarpAnimation(0.5);
      seen.push(node.warpGeometry?.destinationPosition(0).x ?? -1);
    }

    expect(seen).toEqual([0.1, 0.2, 0.2, 0.3, 0.3, 0.3]);
    expect(node.warpAnimation).toBeNull();
  });

  it("honors explicit per-grid times", () => {
    const grids = [shiftedGrid(0.1), shiftedGrid(0.2)];
    const node = new Node();
    node.runWarpAnimation(animateWithWarps(grids, [0.2, 0.8]));

    node.advanceWarpAnimation(0.1);
    expect(node.warpGeometry?.destinationPosition(0).x).toBe(0.1);

    node.advanceWarpAnimation(0.2);
    expect(node.warpGeometry?.destinationPosition(0).x).toBe(0.2);
  });

  it("copies grids onto the node", () => {
    const grids = [shiftedGrid(0.1)];
    const node = new Node();
    node.runWarpAnimation(animateWithWarps(grids, 1));
    node.advanceWarpAnimation(0.5);

    node.warpGeometry?.setDestinationPosition(0, { x: 9, y: 9 });
    expect(grids[0]?.destinationPosition(0)).toEqual({ x: 0.1, y: 0 });
  });
});

describe("Node warp animation slot", () => {
  it("replaces a running animation", () => {
    const node = new Node();
    const first = warpTo(shiftedGrid(0.5), 1);
    const second = warpTo(shiftedGrid(0.2), 1);
    node.runWarpAnimation(first);
    node.runWarpAnimation(second);
    expect(node.warpAnimation).toBe(second);

    node.removeWarpAnimation();
    expect(node.warpAnimation).toBeNull();
  });
});
