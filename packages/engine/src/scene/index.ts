export * from "./Node";
export * from "./SpriteNode";
export * from "./Scene";
export * from "./transforms";
