/**
 * Shared error and result types.
 */

export * from "./errors.js";
export * from "./result.js";
