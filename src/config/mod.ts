/**
 * Configuration Module
 *
 * @module config
 */

export {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  EngineConfigError,
  type EngineEvaluationConfig,
  type EngineFallbackConfig,
  type EngineLoggingConfig,
  evaluatorOptionsFromConfig,
  loadEngineConfig,
  loggerConfigFromEngineConfig,
  parseEngineConfig,
} from "./engine-config.ts";
