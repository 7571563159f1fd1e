/**
 * Backlink preflight planning and QC validation.
 *
 * The planner turns an order into a preflight matrix; the validator scores
 * a finished article against it. The pipeline drives both for an order and
 * the CLI (src/cli/qc.ts) exposes them from the command line.
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./types/index.js";
export * from "./reference/index.js";
export * from "./lexical/index.js";
export * from "./trust/index.js";
export * from "./portfolio/index.js";
export * from "./preflight/index.js";
export * from "./qc/index.js";
export * from "./autofix/index.js";
export * from "./orders/index.js";
export * from "./pipeline/index.js";
