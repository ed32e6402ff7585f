// Input
export * from "./input";

// Audio
export * from "./audio";
