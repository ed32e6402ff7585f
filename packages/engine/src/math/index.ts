export * from "./scalar";
export * from "./vector";
export * from "./rect";
export * from "./range";
export * from "./affine";
export * from "./color";
