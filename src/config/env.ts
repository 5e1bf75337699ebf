/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Variables to read from. Defaults to process.env; tests pass a plain record.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string, env: EnvSource = process.env): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: EnvSource = process.env
): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
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

/**
 * Get an optional environment variable restricted to a fixed set of values.
 */
export function optionalEnvEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env
): T {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${key}: ${value}. Must be ${allowed.join(", ")}.`
    );
  }
  return match;
}
