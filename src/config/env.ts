/**
 * Environment variable access.
 *
 * Every reader either returns a usable value or throws ConfigError naming
 * the variable. Values are read once, when AppConfig is assembled.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readRaw(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get a required environment variable.
 */
export function requireEnv(key: string): string {
  const value = readRaw(key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readRaw(key) ?? defaultValue;
}

/**
 * Positive integers only: concurrency, timeouts and TTLs are all > 0.
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readRaw(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new ConfigError(
      `Environment variable ${key} must be a positive integer, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Recognizes true/false, 1/0 and yes/no, case-insensitive.
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readRaw(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
