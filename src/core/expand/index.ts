// src/core/expand/index.ts

export * from "./output";
export * from "./names";
export * from "./loader";
export * from "./expander";
