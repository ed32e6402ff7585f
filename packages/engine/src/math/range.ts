import type { Range } from "@kinetica/contracts";
import { degreesToRadians } from "./scalar";

export const NO_LIMITS: Readonly<Range> = Object.freeze({
  lower: -Infinity,
  upper: Infinity,
});

export function rangeOf(lower: number, upper: number): Range {
  return { lower, upper };
}

/** value ± variance */
export function rangeAround(value: number, variance: number): Range {
  return { lower: value - variance, upper: value + variance };
}

export function atLeast(lower: number): Range {
  return { lower, upper: Infinity };
}

export function atMost(upper: number): Range {
  return { lower: -Infinity, upper };
}

export function constantRange(value: number): Range {
  return { lower: value, upper: value };
}

/** Converts a range given in degrees to radians. */
export function rangeDegrees(range: Range): Range {
  return {
    lower: degreesToRadians(range.lower),
    upper: degreesToRadians(range.upper),
  };
}

export function clampToRange(range: Range, value: number): number {
  return Math.max(range.lower, Math.min(range.upper, value));
}

export function rangeContains(range: Range, value: number): boolean {
  return value >= range.lower && value <= range.upper;
}

export function rangeSpan(range: Range): number {
  return range.upper - range.lower;
}

export function rangeCenter(range: Range): number {
  return (range.lower + range.upper) / 2;
}

export function isConstantRange(range: Range): boolean {
  return range.lower === range.upper;
}
