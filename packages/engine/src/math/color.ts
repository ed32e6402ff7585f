import type { Color } from "@kinetica/contracts";

export function lerpColor(from: Color, to: Color, t: number): Color {
  return {
    red: from.red + (to.red - from.red) * t,
    green: from.green + (to.green - from.green) * t,
    blue: from.blue + (to.blue - from.blue) * t,
    alpha: from.alpha + (to.alpha - from.alpha) * t,
  };
}

export function withAlpha(color: Color, alpha: number): Color {
  return { ...color, alpha };
}
