/**
 * Application wiring.
 *
 * Loads configuration and the safety table once, then builds the shared
 * pipeline and review gate. Every configuration problem, including an
 * incomplete safety table, surfaces here rather than at validation time.
 */

import {
  loadAppConfig,
  loadSafetyTableFile,
  validateConfig,
  type AppConfig,
  type EnvSource,
  type SafetyTable,
} from "./config/index.js";
import { createLogger, type Logger, type LoggerOptions } from "./logging/index.js";
import { ValidationPipeline } from "./pipeline/index.js";
import { ReviewGate } from "./review/index.js";

export interface BootstrapOptions {
  /** Variables to configure from; defaults to process.env */
  env?: EnvSource;
  /** Overrides for the logger built from configuration */
  logger?: Omit<LoggerOptions, "level" | "logDir" | "scope">;
  /** Safety table path, taking precedence over SAFETY_TABLE_PATH */
  tablePath?: string;
}

export interface App {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly table: SafetyTable;
  readonly pipeline: ValidationPipeline;
  readonly gate: ReviewGate;
}

/**
 * @throws ConfigError on invalid environment configuration
 * @throws SafetyConfigError if the safety table cannot be loaded
 */
export function bootstrap(options: BootstrapOptions = {}): App {
  const config = loadAppConfig(options.env);
  validateConfig(config);

  const logger = createLogger({
    ...options.logger,
    level: config.debug ? "debug" : config.logLevel,
    logDir: config.logDir,
    scope: config.appName,
  });

  const tablePath = options.tablePath ?? config.safetyTablePath;
  const table = loadSafetyTableFile(tablePath);

  logger.info("Safety table loaded", {
    path: tablePath,
    version: table.version,
  });
  logger.debug("Configuration loaded", {
    env: config.env,
    logLevel: config.logLevel,
    errorDisclosure: config.errorDisclosure,
  });

  const pipeline = ValidationPipeline.fromTable(table, { logger: logger.child("pipeline") });
  const gate = new ReviewGate({ logger: logger.child("review") });

  return { config, logger, table, pipeline, gate };
}
