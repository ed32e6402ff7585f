export * from "./CommandBuffer";
export * from "./drawCommands";
export * from "./pack";
