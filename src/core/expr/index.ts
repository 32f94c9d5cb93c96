// src/core/expr/index.ts

export * from "./tokenize";
export * from "./parse";
export * from "./evaluate";
