/**
 * pg-fluent - Type Definitions
 */

export * from "./errors.js";
export * from "./result.js";
export * from "./database.js";
