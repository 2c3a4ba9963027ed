/**
 * Logging and observability utilities.
 */

export { generateBuildId } from "./build-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogSink,
} from "./logger.js";
