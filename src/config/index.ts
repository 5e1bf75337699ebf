/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { resolve } from "node:path";
import { ERROR_DISCLOSURES, type ErrorDisclosure } from "../errors/presentation.js";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";
import { DEFAULT_SAFETY_TABLE_PATH } from "./safety/defaults.js";
import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
  type EnvSource,
} from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

// Re-export safety table configuration module
export * from "./safety/index.js";

export const APP_ENVS = ["development", "production", "test"] as const;
export type AppEnv = (typeof APP_ENVS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnv;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Directory for log files, including the audit trail */
  readonly logDir: string;
  /** Application name */
  readonly appName: string;
  /** Absolute path of the safety table */
  readonly safetyTablePath: string;
  /** How validation errors are shown to users */
  readonly errorDisclosure: ErrorDisclosure;
}

/**
 * Build configuration from a set of variables.
 * Fails fast with ConfigError on any invalid value.
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const appEnv = optionalEnvEnum("NODE_ENV", APP_ENVS, "development", env);
  const tablePath = optionalEnv("SAFETY_TABLE_PATH", "", env);

  return Object.freeze({
    env: appEnv,
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    appName: optionalEnv("APP_NAME", "clinical-safety-gate", env),
    safetyTablePath: tablePath === "" ? DEFAULT_SAFETY_TABLE_PATH : resolve(tablePath),
    // Detailed errors in production would expose the forbidden vocabulary.
    errorDisclosure: optionalEnvEnum(
      "ERROR_DISCLOSURE",
      ERROR_DISCLOSURES,
      appEnv === "production" ? "generic" : "detailed",
      env
    ),
  });
}

/**
 * Validate that all required configuration is present and consistent.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (config.env === "production" && config.errorDisclosure !== "generic") {
    throw new ConfigError(
      "Invalid ERROR_DISCLOSURE: detailed. Production deployments must use generic."
    );
  }
}
