export * from "./config";
export * from "./errors";
export * from "./responses";
export * from "./tokens";
