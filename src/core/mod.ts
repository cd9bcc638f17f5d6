/**
 * Core module exports
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./config.ts";
export * from "./log.ts";
export * from "./line-source.ts";
export * from "./constants.ts";
