export * from "./types";
export * from "./errors";
export * from "./point";
export * from "./connection";
export * from "./node";
export * from "./path";
export * from "./net";
export * from "./logger";
export * from "./config";
