export * from "./edges";
