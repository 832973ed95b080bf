export * from "./config";
export * from "./errors";
export * from "./http";
export * from "./invocation";
export * from "./logger";
export * from "./rate-limiter";
