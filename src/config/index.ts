/**
 * Application configuration.
 * Process-level settings from the environment, plus the workflow tuning
 * module re-exported from ./workflow.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvChoice } from "./env.js";
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

export * from "./workflow/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Application name, printed in log entries */
  readonly appName: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Append log entries to a file as well as the console */
  readonly logToFile: boolean;
  /** Directory used by the file-backed state store */
  readonly stateDir: string;
  /** Workflow tuning file read by the CLI */
  readonly workflowConfigPath: string;
}

/**
 * Load and validate application configuration.
 * Fails fast on values outside their allowed sets.
 */
export function loadConfig(): AppConfig {
  const debug = optionalEnvBool("DEBUG", false);
  return {
    env: optionalEnvChoice("NODE_ENV", ENVIRONMENTS, "development"),
    debug,
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, debug ? "debug" : "info"),
    appName: optionalEnv("APP_NAME", "topic-quiz"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    stateDir: optionalEnv("STATE_DIR", "output/sessions"),
    workflowConfigPath: optionalEnv("WORKFLOW_CONFIG", "config/workflow.json"),
  };
}

/**
 * Validate configuration that cannot be checked field by field.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig): void {
  if (appConfig.logToFile && appConfig.logDir.trim() === "") {
    throw new ConfigError("LOG_DIR must be set when LOG_TO_FILE is enabled");
  }
  if (appConfig.stateDir.trim() === "") {
    throw new ConfigError("STATE_DIR must not be empty");
  }
}

/**
 * Logger configured from the environment.
 */
export function createAppLogger(appConfig: AppConfig): Logger {
  return createLogger({
    level: appConfig.logLevel,
    name: appConfig.appName,
    logDir: appConfig.logDir,
    file: appConfig.logToFile,
  });
}
