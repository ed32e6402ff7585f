import type { Color } from "../color/color";
import type { Rect, Size, Vec2 } from "../geometry/geometry";
import type { NamedAttribute } from "../shader/attributes";
import { WHITE } from "../color/color";
import { UNIT_RECT } from "../geometry/geometry";

/**
 * Opaque texture handle resolved by the renderer. 0 means "no texture":
 * the quad is filled with the command's color.
 */
export type TextureId = number;

export const NO_TEXTURE: TextureId = 0;

export type TextureFilteringMode = "nearest" | "linear";

export type BlendMode =
  | "alpha"
  | "add"
  | "subtract"
  | "multiply"
  | "multiplyX2"
  | "screen"
  | "replace"
  | "multiplyAlpha";

/**
 * Copy of a node's warp grid at emission time. Positions are normalized to
 * the sprite's bounds.
 */
export interface WarpSnapshot {
  columns: number;
  rows: number;
  subdivisionLevels: number;
  sourcePositions: Vec2[];
  destinationPositions: Vec2[];
}

/**
 * One sprite draw, fully resolved to world space.
 *
 * Commands are produced fresh for every frame and carry no identity.
 * Consumers must not mutate them or hold on to them past the frame.
 */
export interface DrawCommand {
  // Transform (world space)
  worldPosition: Vec2;
  worldRotation: number;
  worldScale: Size;

  // Sprite data
  size: Size;
  anchorPoint: Vec2;
  textureId: TextureId;
  textureRect: Rect;
  filteringMode: TextureFilteringMode;
  usesMipmaps: boolean;

  // Appearance
  color: Color;
  /** Product of the alphas of the node and all of its ancestors */
  alpha: number;
  zPosition: number;
  blendMode: BlendMode;
  /** Nine-slice center region, in unit texture space */
  centerRect: Rect;

  warp: WarpSnapshot | null;
  attributes: NamedAttribute[];
}

export function createDrawCommand(partial: Partial<DrawCommand> = {}): DrawCommand {
  return {
    worldPosition: { x: 0, y: 0 },
    worldRotation: 0,
    worldScale: { width: 1, height: 1 },
    size: { width: 0, height: 0 },
    anchorPoint: { x: 0.5, y: 0.5 },
    textureId: NO_TEXTURE,
    textureRect: { ...UNIT_RECT },
    filteringMode: "linear",
    usesMipmaps: false,
    color: { ...WHITE },
    alpha: 1,
    zPosition: 0,
    blendMode: "alpha",
    centerRect: { ...UNIT_RECT },
    warp: null,
    attributes: [],
    ...partial,
  };
}
