/**
 * Warp animations, advanced once per fixed step by the scene's warp stage.
 */

import type { Seconds } from "@kinetica/contracts";
import { WarpGeometryGrid } from "./WarpGeometryGrid";

/** Anything that carries a warp grid. */
export interface Warpable {
  warpGeometry: WarpGeometryGrid | null;
}

export interface WarpAnimation {
  readonly duration: Seconds;
  /**
   * Advances by dt and writes the node's grid.
   * @returns true once the animation has finished
   */
  advance(target: Warpable, dt: Seconds): boolean;
}

// Absorbs the rounding left by summing many fixed timesteps
const TIME_EPSILON = 1e-9;

abstract class TimedWarpAnimation implements WarpAnimation {
  readonly duration: Seconds;
  private elapsed: Seconds = 0;

  constructor(duration: Seconds) {
    this.duration = Number.isFinite(duration) ? Math.max(0, duration) : 0;
  }

  advance(target: Warpable, dt: Seconds): boolean {
    this.elapsed += Math.max(0, dt);
    const finished = this.elapsed >= this.duration - TIME_EPSILON;
    const progress = finished ? 1 : this.elapsed / this.duration;
    this.apply(target, progress);
    return finished;
  }

  protected abstract apply(target: Warpable, progress: number): void;
}

/**
 * Blends from the node's grid at the first step to a target grid.
 * A node without a grid starts from the identity grid of the target's shape;
 * a grid of a different shape leaves the node untouched.
 */
export class WarpToAnimation extends TimedWarpAnimation {
  private readonly target: WarpGeometryGrid;
  private start: WarpGeometryGrid | null = null;

  constructor(target: WarpGeometryGrid, duration: Seconds) {
    super(duration);
    this.target = target.copy();
  }

  protected apply(node: Warpable, progress: number): void {
    if (this.start === null) {
      this.start =
        node.warpGeometry?.copy() ?? new WarpGeometryGrid(this.target.columns, this.target.rows);
    }

    const blended = WarpGeometryGrid.interpolate(this.start, this.target, progress);
    if (blended !== null) {
      node.warpGeometry = blended;
    }
  }
}

/**
 * Steps through a list of grids, either in equal slices of the duration or
 * with an explicit time per grid.
 */
export class WarpSequenceAnimation extends TimedWarpAnimation {
  private readonly warps: readonly WarpGeometryGrid[];
  private readonly times: readonly Seconds[] | null;
  private currentIndex = -1;

  constructor(warps: readonly WarpGeometryGrid[], timing: Seconds | readonly Seconds[]) {
    super(typeof timing === "number" ? timing : timing.reduce((sum, t) => sum + t, 0));
    this.warps = warps.map((w) => w.copy());
    this.times = typeof timing === "number" ? null : [...timing];
  }

  protected apply(node: Warpable, progress: number): void {
    if (this.warps.length === 0) return;

    const index = Math.min(this.indexFor(progress), this.warps.length - 1);
    if (index !== this.currentIndex || progress === 0) {
      this.currentIndex = index;
      const warp = this.warps[index];
      if (warp !== undefined) {
        node.warpGeometry = warp.copy();
      }
    }
  }

  private indexFor(progress: number): number {
    if (this.times === null || this.duration === 0) {
      return Math.floor(progress * this.warps.length);
    }

    let accumulated = 0;
    for (let i = 0; i < this.times.length; i++) {
      accumulated += (this.times[i] ?? 0) / this.duration;
      if (progress < accumulated) return i;
    }
    return this.times.length - 1;
  }
}

export function warpTo(target: WarpGeometryGrid, duration: Seconds): WarpAnimation {
  return new WarpToAnimation(target, duration);
}

/** `timing` is a total duration split evenly, or one duration per grid. */
export function animateWithWarps(
  warps: readonly WarpGeometryGrid[],
  timing: Seconds | readonly Seconds[]
): WarpAnimation {
  return new WarpSequenceAnimation(warps, timing);
}
