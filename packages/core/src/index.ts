export * from "./core/result.ts";
export * from "./logger.ts";
export * from "./config/config.ts";
