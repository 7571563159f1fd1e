/**
 * Application configuration.
 *
 * Process-level settings come from the environment. Scoring and planning
 * rules live in the QC policy (./qc), which is passed explicitly to the
 * engine rather than read from here.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError } from "./env.js";

export * from "./qc/index.js";

export interface AppConfig {
  /** development, production or test */
  readonly env: string;
  readonly debug: boolean;
  readonly logLevel: string;
  readonly appName: string;
  /** Directory for log files when file logging is on */
  readonly logDir: string;
  readonly logToFile: boolean;
  /** Orders processed in parallel by the batch runner */
  readonly workerConcurrency: number;
  /** Budget for each external collaborator call (profile, registry, ...) */
  readonly collectorTimeoutMs: number;
  /** How long an order lease is held before it can be reclaimed */
  readonly leaseTtlMs: number;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const ENVIRONMENTS = ["development", "production", "test"] as const;

export function loadAppConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "backlink-qc"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    workerConcurrency: optionalEnvInt("WORKER_CONCURRENCY", 4),
    collectorTimeoutMs: optionalEnvInt("COLLECTOR_TIMEOUT_MS", 5000),
    leaseTtlMs: optionalEnvInt("LEASE_TTL_MS", 600_000),
  };
}

/**
 * Check values that have a closed set of options.
 * Call at startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!(ENVIRONMENTS as readonly string[]).includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!(LOG_LEVELS as readonly string[]).includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }
}
