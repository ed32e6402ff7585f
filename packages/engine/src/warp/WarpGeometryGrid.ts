/**
 * Warp Geometry Grid
 *
 * A deformable (columns+1) × (rows+1) vertex lattice over a sprite's unit
 * square. Source positions are the regular lattice and never change;
 * destination positions say where each source vertex is drawn. A grid whose
 * destinations equal its sources is the identity warp.
 *
 * Vertices are stored row-major: index = row * (columns + 1) + column.
 */

import type { Vec2, WarpSnapshot } from "@kinetica/contracts";

function regularPositions(columns: number, rows: number): Vec2[] {
  const positions: Vec2[] = [];
  for (let row = 0; row <= rows; row++) {
    for (let col = 0; col <= columns; col++) {
      positions.push({ x: col / columns, y: row / rows });
    }
  }
  return positions;
}

function normalizeCount(count: number): number {
  if (!Number.isFinite(count)) return 1;
  return Math.max(1, Math.floor(count));
}

function copyPositions(positions: readonly Vec2[]): Vec2[] {
  return positions.map((p) => ({ x: p.x, y: p.y }));
}

export class WarpGeometryGrid {
  readonly columns: number;
  readonly rows: number;

  // Only written while a grid is being built
  private sources: readonly Vec2[];
  private destinations: Vec2[];

  /**
   * Creates an identity grid. Counts are floored and raised to at least 1.
   */
  constructor(columns: number, rows: number) {
    this.columns = normalizeCount(columns);
    this.rows = normalizeCount(rows);
    this.sources = Object.freeze(regularPositions(this.columns, this.rows));
    this.destinations = copyPositions(this.sources);
  }

  /**
   * Creates a grid from explicit positions. A source list of the wrong length
   * falls back to the regular lattice; a destination list of the wrong length
   * falls back to the sources.
   */
  static fromPositions(
    columns: number,
    rows: number,
    sourcePositions: readonly Vec2[],
    destinationPositions: readonly Vec2[]
  ): WarpGeometryGrid {
    const grid = new WarpGeometryGrid(columns, rows);
    const expected = grid.vertexCount;
    const sources =
      sourcePositions.length === expected ? copyPositions(sourcePositions) : copyPositions(grid.sources);
    const destinations =
      destinationPositions.length === expected ? copyPositions(destinationPositions) : copyPositions(sources);
    return grid.withPositions(sources, destinations);
  }

  get vertexCount(): number {
    return (this.columns + 1) * (this.rows + 1);
  }

  // === Position access ===

  /** Source position at a flat index; out of range yields (0, 0). */
  sourcePosition(index: number): Vec2 {
    const p = this.sources[index];
    return p === undefined || !Number.isInteger(index) ? { x: 0, y: 0 } : { x: p.x, y: p.y };
  }

  /** Destination position at a flat index; out of range yields (0, 0). */
  destinationPosition(index: number): Vec2 {
    const p = this.destinations[index];
    return p === undefined || !Number.isInteger(index) ? { x: 0, y: 0 } : { x: p.x, y: p.y };
  }

  vertexIndex(column: number, row: number): number | null {
    if (!Number.isInteger(column) || !Number.isInteger(row)) return null;
    if (column < 0 || column > this.columns || row < 0 || row > this.rows) return null;
    return row * (this.columns + 1) + column;
  }

  sourcePositionAt(column: number, row: number): Vec2 | null {
    const index = this.vertexIndex(column, row);
    return index === null ? null : this.sourcePosition(index);
  }

  destinationPositionAt(column: number, row: number): Vec2 | null {
    const index = this.vertexIndex(column, row);
    return index === null ? null : this.destinationPosition(index);
  }

  // === Mutation ===

  /** Returns false (and changes nothing) for an out-of-range index. */
  setDestinationPosition(index: number, position: Vec2): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.destinations.length) {
      return false;
    }
    this.destinations[index] = { x: position.x, y: position.y };
    return true;
  }

  setDestinationPositionAt(column: number, row: number, position: Vec2): boolean {
    const index = this.vertexIndex(column, row);
    return index === null ? false : this.setDestinationPosition(index, position);
  }

  /**
   * Replaces every destination at once. A list whose length differs from the
   * vertex count is rejected without touching the grid.
   */
  setAllDestinationPositions(positions: readonly Vec2[]): boolean {
    if (positions.length !== this.vertexCount) return false;
    this.destinations = copyPositions(positions);
    return true;
  }

  resetDestinations(): void {
    this.destinations = copyPositions(this.sources);
  }

  // === Bulk access ===

  get allSourcePositions(): Vec2[] {
    return copyPositions(this.sources);
  }

  get allDestinationPositions(): Vec2[] {
    return copyPositions(this.destinations);
  }

  get isIdentity(): boolean {
    return this.destinations.every((p, i) => {
      const s = this.sources[i];
      return s !== undefined && s.x === p.x && s.y === p.y;
    });
  }

  hasSameShape(other: WarpGeometryGrid): boolean {
    return this.columns === other.columns && this.rows === other.rows;
  }

  // === Interpolation ===

  /**
   * Linearly blends destination positions. Progress is clamped to [0, 1].
   * Grids of different shape cannot be blended and yield null. The result
   * takes its sources from `from`.
   */
  static interpolate(
    from: WarpGeometryGrid,
    to: WarpGeometryGrid,
    progress: number
  ): WarpGeometryGrid | null {
    if (!from.hasSameShape(to)) return null;

    const t = Number.isNaN(progress) ? 0 : Math.max(0, Math.min(1, progress));
    const blended: Vec2[] = [];
    for (let i = 0; i < from.vertexCount; i++) {
      const a = from.destinationPosition(i);
      const b = to.destinationPosition(i);
      blended.push({
        x: a.x + (b.x - a.x) * t,
        y: a.y + (b.y - a.y) * t,
      });
    }

    return new WarpGeometryGrid(from.columns, from.rows).withPositions(
      copyPositions(from.sources),
      blended
    );
  }

  copy(): WarpGeometryGrid {
    return new WarpGeometryGrid(this.columns, this.rows).withPositions(
      copyPositions(this.sources),
      copyPositions(this.destinations)
    );
  }

  /** Plain-data copy for a draw command. */
  snapshot(subdivisionLevels: number): WarpSnapshot {
    return {
      columns: this.columns,
      rows: this.rows,
      subdivisionLevels,
      sourcePositions: copyPositions(this.sources),
      destinationPositions: copyPositions(this.destinations),
    };
  }

  private withPositions(sources: Vec2[], destinations: Vec2[]): this {
    this.sources = Object.freeze(sources);
    this.destinations = destinations;
    return this;
  }
}
