export * from "./ids.js";
export * from "./syntax.js";
export * from "./patterns.js";
export * from "./walk.js";
export * from "./backend.js";
export * from "./line-table.js";
export * from "./recording-backend.js";
export * from "./scope-stack.js";
export * from "./scope-map.js";
export * from "./mir-scopes.js";
export * from "./pipeline.js";
