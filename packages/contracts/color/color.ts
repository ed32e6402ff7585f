/** Linear RGBA color, each component in 0..1. */
export interface Color {
  red: number;
  green: number;
  blue: number;
  alpha: number;
}

export function rgba(red: number, green: number, blue: number, alpha = 1): Color {
  return { red, green, blue, alpha };
}

export const WHITE: Readonly<Color> = Object.freeze(rgba(1, 1, 1));
export const BLACK: Readonly<Color> = Object.freeze(rgba(0, 0, 0));
export const CLEAR: Readonly<Color> = Object.freeze(rgba(0, 0, 0, 0));
