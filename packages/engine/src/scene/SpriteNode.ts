import type {
  AttributeValue,
  BlendMode,
  Color,
  DrawCommand,
  NamedAttribute,
  Rect,
  Size,
  TextureFilteringMode,
  TextureId,
  Vec2,
} from "@kinetica/contracts";
import { NO_TEXTURE, UNIT_RECT, WHITE } from "@kinetica/contracts";
import { lerpColor } from "../math/color";
import { Node } from "./Node";
import type { WorldState } from "./transforms";

/** A texture region as the renderer knows it. */
export interface TextureRef {
  id: TextureId;
  /** Sub-rectangle in unit texture space */
  rect: Rect;
  filteringMode: TextureFilteringMode;
  usesMipmaps: boolean;
}

export function textureRef(id: TextureId, partial: Partial<Omit<TextureRef, "id">> = {}): TextureRef {
  return {
    id,
    rect: { ...UNIT_RECT },
    filteringMode: "linear",
    usesMipmaps: false,
    ...partial,
  };
}

export const ANCHOR_CENTER: Readonly<Vec2> = Object.freeze({ x: 0.5, y: 0.5 });
export const ANCHOR_BOTTOM_LEFT: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });
export const ANCHOR_BOTTOM_CENTER: Readonly<Vec2> = Object.freeze({ x: 0.5, y: 0 });
export const ANCHOR_TOP_LEFT: Readonly<Vec2> = Object.freeze({ x: 0, y: 1 });

export interface SpriteNodeOptions {
  name?: string;
  size?: Size;
  texture?: TextureRef | null;
  color?: Color;
}

/**
 * A textured or solid-color quad. The only node type that produces draw
 * commands.
 */
export class SpriteNode extends Node {
  size: Size;
  texture: TextureRef | null;
  color: Color;
  /** 0 shows the texture as-is, 1 tints it fully with `color` */
  colorBlendFactor = 0;
  blendMode: BlendMode = "alpha";
  /** Nine-slice center region, in unit texture space */
  centerRect: Rect = { ...UNIT_RECT };

  private readonly attributeMap = new Map<string, AttributeValue>();

  constructor(options: SpriteNodeOptions = {}) {
    super(options.name ?? null);
    this.size = options.size ?? { width: 0, height: 0 };
    this.texture = options.texture ?? null;
    this.color = options.color ?? { ...WHITE };
  }

  /** The color multiplied into the quad, after blending with white. */
  get effectiveColor(): Color {
    if (this.texture === null || this.colorBlendFactor >= 1) {
      return this.color;
    }
    if (this.colorBlendFactor <= 0) {
      return WHITE;
    }
    return lerpColor(WHITE, this.color, this.colorBlendFactor);
  }

  override get frame(): Rect {
    return {
      x: this.position.x - this.size.width * this.anchorPoint.x,
      y: this.position.y - this.size.height * this.anchorPoint.y,
      width: this.size.width,
      height: this.size.height,
    };
  }

  setSquareSize(side: number): void {
    this.size = { width: side, height: side };
  }

  /** Sets scale so the rendered size matches `target`. A zero size axis keeps its scale. */
  scaleToSize(target: Size): void {
    this.scale = {
      width: this.size.width !== 0 ? target.width / this.size.width : this.scale.width,
      height: this.size.height !== 0 ? target.height / this.size.height : this.scale.height,
    };
  }

  // === Shader attributes ===

  /** Replacing an existing attribute keeps its position. */
  setAttribute(name: string, value: AttributeValue): void {
    this.attributeMap.set(name, value);
  }

  attribute(name: string): AttributeValue | null {
    return this.attributeMap.get(name) ?? null;
  }

  removeAttribute(name: string): boolean {
    return this.attributeMap.delete(name);
  }

  removeAllAttributes(): void {
    this.attributeMap.clear();
  }

  get attributes(): NamedAttribute[] {
    return [...this.attributeMap].map(([name, value]) => ({ name, value }));
  }

  // === Draw ===

  override makeDrawCommand(world: WorldState): DrawCommand {
    const texture = this.texture;
    return {
      worldPosition: world.position,
      worldRotation: world.rotation,
      worldScale: world.scale,
      size: { ...this.size },
      anchorPoint: { ...this.anchorPoint },
      textureId: texture?.id ?? NO_TEXTURE,
      textureRect: texture === null ? { ...UNIT_RECT } : { ...texture.rect },
      filteringMode: texture?.filteringMode ?? "linear",
      usesMipmaps: texture?.usesMipmaps ?? false,
      color: { ...this.effectiveColor },
      alpha: world.alpha,
      zPosition: this.zPosition,
      blendMode: this.blendMode,
      centerRect: { ...this.centerRect },
      warp: this.warpGeometry?.snapshot(this.subdivisionLevels) ?? null,
      attributes: this.attributes,
    };
  }
}
