export * from "./GameLoop";
