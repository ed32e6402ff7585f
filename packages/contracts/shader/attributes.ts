/**
 * Per-node shader attribute values.
 *
 * Each shape is its own variant; there is no implicit conversion between a
 * scalar and a vector or between vector widths.
 */
export type AttributeValue =
  | { kind: "float"; value: number }
  | { kind: "vec2"; value: readonly [number, number] }
  | { kind: "vec3"; value: readonly [number, number, number] }
  | { kind: "vec4"; value: readonly [number, number, number, number] };

export type AttributeKind = AttributeValue["kind"];

export interface NamedAttribute {
  name: string;
  value: AttributeValue;
}

export function floatAttribute(value: number): AttributeValue {
  return { kind: "float", value };
}

export function vec2Attribute(x: number, y: number): AttributeValue {
  return { kind: "vec2", value: [x, y] };
}

export function vec3Attribute(x: number, y: number, z: number): AttributeValue {
  return { kind: "vec3", value: [x, y, z] };
}

export function vec4Attribute(x: number, y: number, z: number, w: number): AttributeValue {
  return { kind: "vec4", value: [x, y, z, w] };
}

/** Flattened float components, e.g. for uniform upload. */
export function attributeComponents(attr: AttributeValue): number[] {
  return attr.kind === "float" ? [attr.value] : [...attr.value];
}
