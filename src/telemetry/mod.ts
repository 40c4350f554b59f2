/**
 * Telemetry Module
 *
 * @module telemetry
 */

export {
  getLogger,
  isLogLevel,
  LOG_LEVELS,
  logger,
  type Logger,
  type LoggerConfig,
  type LoggerName,
  type LogLevel,
  setupLogger,
  silentLogger,
} from "./logger.ts";
export { createEvaluationStats, type EvaluationStats, recordRule } from "./evaluation-stats.ts";
