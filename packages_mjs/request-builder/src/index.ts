/**
 * Request Builder - fluent construction of outbound HTTP request descriptions
 */

export const VERSION = "0.1.0";

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./core/url.js";
export * from "./core/multipart.js";
export * from "./core/builder.js";
export * from "./dispatch.js";
