export * from "./fixtures.js";
export * from "./in-memory.js";
export * from "./test-layer.js";
