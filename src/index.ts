/**
 * Entry point for the CDM semantic registry.
 *
 * Resolves declarative semantic definitions (concepts, enumerations, groups,
 * CDM profiles and templates) into an immutable, queryable registry and
 * compiles CDM rows from it.
 *
 * @example
 *   import { loadEngineOptions, parseDefinitionSetOrThrow, buildRegistry } from "cdm-semantic-registry";
 *
 *   const registry = buildRegistry(parseDefinitionSetOrThrow(json, "staging.json"), {
 *     options: loadEngineOptions({ strictConcepts: true }),
 *   });
 */

export * from "./semantics/index.js";

export {
  ConfigError,
  loadAppConfig,
  validateConfig,
  loadEngineOptions,
  EngineConfigError,
  EngineOptionsSchema,
  DEFAULT_ENGINE_OPTIONS,
  type AppConfig,
  type EngineOptions,
  type EngineConfigIssue,
} from "./config/index.js";

export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  generateBuildId,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./logging/index.js";
