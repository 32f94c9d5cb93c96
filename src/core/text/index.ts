// src/core/text/index.ts

export * from "./buffer";
export * from "./source";
export * from "./cursor";
export * from "./span";
