/**
 * Utility module barrel exports.
 */

export * from "./errors.js";
export * from "./format.js";
export * from "./logger.js";
export * from "./type-guards.js";
