export * from "./types";
export * from "./definition";
export * from "./registry";
export * from "./dump";
