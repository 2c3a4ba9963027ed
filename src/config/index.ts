/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 *
 * Nothing here is a process-wide singleton: callers load the config once
 * and pass it (or the engine options derived from it) to whatever needs it.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

export * from "./engine/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Application name, used as the root logger scope */
  readonly appName: string;
  /** Reject row concept ids outside a template's entity concept set */
  readonly strictConcepts: boolean;
}

const ENVIRONMENTS = ["development", "production", "test"] as const;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load application configuration from the environment.
 * Fails fast on malformed values.
 */
export function loadAppConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): AppConfig {
  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", env),
    logLevel,
    appName: optionalEnv("APP_NAME", "cdm-semantics", env),
    strictConcepts: optionalEnvBool("SEMANTICS_STRICT_CONCEPTS", false, env),
  });
}

/**
 * Validate a loaded configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!ENVIRONMENTS.some((env) => env === config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }
}
