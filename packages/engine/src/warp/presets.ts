/**
 * Preset warps.
 *
 * Each preset builds a fresh identity grid and displaces its destinations
 * once. They are pure: the same arguments always give the same grid. Build
 * them at setup time, or every step when animating a parameter.
 */

import type { Vec2 } from "@kinetica/contracts";
import { WarpGeometryGrid } from "./WarpGeometryGrid";

export interface WaveOptions {
  columns: number;
  rows: number;
  /** Peak displacement in unit grid space */
  amplitude: number;
  /** Full sine periods across the grid */
  frequency: number;
  /** Phase offset in radians @default 0 */
  phase?: number;
  /**
   * true: x is displaced as a function of y (horizontal ripples);
   * false: y is displaced as a function of x.
   * @default true
   */
  horizontal?: boolean;
}

export interface RadialOptions {
  columns: number;
  rows: number;
  /** @default { x: 0.5, y: 0.5 } */
  center?: Vec2;
  /** Vertices at or beyond this distance are untouched @default 0.5 */
  radius?: number;
}

export interface BulgeOptions extends RadialOptions {
  /** Positive bulges outward, negative pinches @default 0.3 */
  strength?: number;
}

export interface TwistOptions extends RadialOptions {
  /** Rotation at the center, in radians @default π/4 */
  angle?: number;
}

const DEFAULT_CENTER: Vec2 = { x: 0.5, y: 0.5 };

/** Smooth falloff: 1 at the center, 0 at the radius. */
function falloff(distance: number, radius: number): number {
  const f = 1 - distance / radius;
  return f * f;
}

export function wave(options: WaveOptions): WarpGeometryGrid {
  const { amplitude, frequency, phase = 0, horizontal = true } = options;
  const grid = new WarpGeometryGrid(options.columns, options.rows);

  for (let i = 0; i < grid.vertexCount; i++) {
    const source = grid.sourcePosition(i);
    if (horizontal) {
      const offset = Math.sin(source.y * frequency * Math.PI * 2 + phase) * amplitude;
      grid.setDestinationPosition(i, { x: source.x + offset, y: source.y });
    } else {
      const offset = Math.sin(source.x * frequency * Math.PI * 2 + phase) * amplitude;
      grid.setDestinationPosition(i, { x: source.x, y: source.y + offset });
    }
  }

  return grid;
}

export function bulge(options: BulgeOptions): WarpGeometryGrid {
  const { center = DEFAULT_CENTER, radius = 0.5, strength = 0.3 } = options;
  const grid = new WarpGeometryGrid(options.columns, options.rows);

  for (let i = 0; i < grid.vertexCount; i++) {
    const source = grid.sourcePosition(i);
    const dx = source.x - center.x;
    const dy = source.y - center.y;
    const distance = Math.sqrt(dx * dx + dy * dy);

    // The center vertex has no direction to push along
    if (distance < radius && distance > 0) {
      const factor = 1 + falloff(distance, radius) * strength;
      grid.setDestinationPosition(i, {
        x: center.x + dx * factor,
        y: center.y + dy * factor,
      });
    }
  }

  return grid;
}

export function twist(options: TwistOptions): WarpGeometryGrid {
  const { center = DEFAULT_CENTER, radius = 0.5, angle = Math.PI / 4 } = options;
  const grid = new WarpGeometryGrid(options.columns, options.rows);

  for (let i = 0; i < grid.vertexCount; i++) {
    const source = grid.sourcePosition(i);
    const dx = source.x - center.x;
    const dy = source.y - center.y;
    const distance = Math.sqrt(dx * dx + dy * dy);

    if (distance < radius) {
      const theta = falloff(distance, radius) * angle;
      const cos = Math.cos(theta);
      const sin = Math.sin(theta);
      grid.setDestinationPosition(i, {
        x: center.x + dx * cos - dy * sin,
        y: center.y + dx * sin + dy * cos,
      });
    }
  }

  return grid;
}
