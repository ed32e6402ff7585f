// Math
export * from "./math";

// Scene graph
export * from "./scene";

// Constraints
export * from "./constraints";

// Warp geometry
export * from "./warp";

// Commands
export * from "./commands";
export * from "./audio";
export * from "./input";

// Loop
export * from "./runtime";
