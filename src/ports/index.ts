export * from "./log";
export * from "./environment";
export * from "./filesystem";
export * from "./output";
export * from "./script";
export * from "./composite";
