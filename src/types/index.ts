export * from "./logger";
export * from "./config";
export * from "./entry";
export * from "./sources";
export * from "./schema";
export * from "./cache";
export * from "./precomputed";
export * from "./search";
export * from "./tool";
export * from "./clients/http";
