export * from "./core/time";

// Geometry and color records
export * from "./geometry/geometry";
export * from "./color/color";

// Host input
export * from "./input/input";

// Declarative node constraints
export * from "./constraints/constraints";

export * from "./shader/attributes";

// Command streams
export * from "./commands/draw";
export * from "./commands/audio";

export * from "./pipeline/interfaces";

export * from "./diagnostics/diagnostics";
