export * from "./types";
export * from "./batch-service";
export * from "./classify";
export * from "./collect";
export * from "./config";
export * from "./dedupe";
export * from "./errors";
export * from "./interactive";
export * from "./logger";
export * from "./noise-filter";
export * from "./pipeline";
export * from "./price";
export * from "./verifier";
