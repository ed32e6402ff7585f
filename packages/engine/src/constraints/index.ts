export * from "./factories";
export * from "./applyConstraints";
