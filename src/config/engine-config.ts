/**
 * Engine Configuration Loader
 *
 * Loads and validates the message-passing engine configuration.
 *
 * Convention: snake_case in YAML → camelCase in TypeScript
 *
 * @module config/engine-config
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { DEFAULT_DEPTH_BUDGET, type EvaluatorOptions } from "../engine/types.ts";
import { defaultFallbackPolicy } from "../engine/fallback.ts";
import { getLogger, isLogLevel, type LoggerConfig, type LogLevel } from "../telemetry/logger.ts";

const log = getLogger("config");

// =============================================================================
// Internal Types (camelCase)
// =============================================================================

export interface EngineEvaluationConfig {
  depthBudget: number;
}

/**
 * Parameters of the vague messages stored when the depth budget runs out
 */
export interface EngineFallbackConfig {
  vagueVariance: number;
  gammaShape: number;
  gammaRate: number;
}

export interface EngineLoggingConfig {
  level: LogLevel;
  file?: string;
}

export interface EngineConfig {
  evaluation: EngineEvaluationConfig;
  fallback: EngineFallbackConfig;
  logging: EngineLoggingConfig;
}

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  evaluation: {
    depthBudget: DEFAULT_DEPTH_BUDGET,
  },
  fallback: {
    vagueVariance: 1e8,
    gammaShape: 1,
    gammaRate: 1e-8,
  },
  logging: {
    level: "info",
  },
};

// =============================================================================
// Error Class
// =============================================================================

export class EngineConfigError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    message: string,
  ) {
    super(`Invalid engine config: ${field}=${value} - ${message}`);
    this.name = "EngineConfigError";
  }
}

// =============================================================================
// File Reading (snake_case - matches YAML)
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Typed access to the parsed YAML document. Values of the wrong type are
 * reported in `errors` and replaced by the default.
 */
class FileReader {
  readonly errors: string[] = [];

  constructor(private readonly document: unknown) {
    if (document !== null && document !== undefined && !isRecord(document)) {
      this.errors.push("config root must be a mapping");
    }
  }

  private value(section: string, key: string): unknown {
    if (!isRecord(this.document)) return undefined;
    const entries = this.document[section];
    if (entries === undefined || entries === null) return undefined;
    if (!isRecord(entries)) {
      const error = `${section} must be a mapping`;
      if (!this.errors.includes(error)) this.errors.push(error);
      return undefined;
    }
    return entries[key];
  }

  number(section: string, key: string, fallback: number): number {
    const value = this.value(section, key);
    if (value === undefined || value === null) return fallback;
    if (typeof value !== "number") {
      this.errors.push(`${section}.${key}=${String(value)} must be a number`);
      return fallback;
    }
    return value;
  }

  string(section: string, key: string): string | undefined {
    const value = this.value(section, key);
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string") {
      this.errors.push(`${section}.${key}=${String(value)} must be a string`);
      return undefined;
    }
    return value;
  }
}

// =============================================================================
// Validation
// =============================================================================

function validateEngineConfig(config: EngineConfig, errors: string[]): void {
  const checkPositive = (name: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${name}=${value} must be a positive number`);
    }
  };

  const checkPositiveInt = (name: string, value: number, min: number, max: number) => {
    if (!Number.isInteger(value) || value < min || value > max) {
      errors.push(`${name}=${value} must be integer in [${min}, ${max}]`);
    }
  };

  // Evaluation
  checkPositiveInt("evaluation.depthBudget", config.evaluation.depthBudget, 1, 1000);

  // Fallback
  checkPositive("fallback.vagueVariance", config.fallback.vagueVariance);
  checkPositive("fallback.gammaShape", config.fallback.gammaShape);
  checkPositive("fallback.gammaRate", config.fallback.gammaRate);

  // Logging
  if (config.logging.file !== undefined && config.logging.file.trim() === "") {
    errors.push("logging.file must not be empty");
  }

  if (errors.length > 0) {
    throw new EngineConfigError("multiple", null, errors.join("; "));
  }
}

// =============================================================================
// Mapping Function
// =============================================================================

function toEngineConfig(file: FileReader): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;

  const level = file.string("logging", "level");
  if (level !== undefined && !isLogLevel(level)) {
    file.errors.push(`logging.level=${level} is not a log level`);
  }
  const logFile = file.string("logging", "file");

  return {
    evaluation: {
      depthBudget: file.number("evaluation", "depth_budget", d.evaluation.depthBudget),
    },
    fallback: {
      vagueVariance: file.number("fallback", "vague_variance", d.fallback.vagueVariance),
      gammaShape: file.number("fallback", "gamma_shape", d.fallback.gammaShape),
      gammaRate: file.number("fallback", "gamma_rate", d.fallback.gammaRate),
    },
    logging: {
      level: isLogLevel(level) ? level : d.logging.level,
      ...(logFile === undefined ? {} : { file: logFile }),
    },
  };
}

/**
 * Parse and validate YAML configuration text
 *
 * @throws EngineConfigError listing every invalid field
 */
export function parseEngineConfig(content: string): EngineConfig {
  const reader = new FileReader(parseYaml(content));
  const config = toEngineConfig(reader);
  validateEngineConfig(config, reader.errors);
  return config;
}

// =============================================================================
// Loader Function
// =============================================================================

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load engine configuration from YAML file
 *
 * Missing file or unparseable YAML: defaults. Invalid values: EngineConfigError.
 *
 * @param configPath - Path to YAML config file
 * @returns Validated configuration (camelCase)
 */
export async function loadEngineConfig(
  configPath = "./config/engine.yaml",
): Promise<EngineConfig> {
  try {
    const content = await readFile(configPath, "utf8");
    const config = parseEngineConfig(content);

    log.info(`[EngineConfig] Config loaded from ${configPath}`);
    return config;
  } catch (error) {
    if (isNotFound(error)) {
      log.info(`[EngineConfig] Config not found at ${configPath}, using defaults`);
      return DEFAULT_ENGINE_CONFIG;
    }

    if (error instanceof EngineConfigError) {
      log.error(`[EngineConfig] Validation failed: ${error.message}`);
      throw error;
    }

    log.error(`[EngineConfig] Failed to load config: ${error}`);
    return DEFAULT_ENGINE_CONFIG;
  }
}

// =============================================================================
// Consumers
// =============================================================================

/**
 * Evaluator options carrying the configured depth budget and fallback
 * parameters; `overrides` win
 */
export function evaluatorOptionsFromConfig(
  config: EngineConfig,
  overrides: EvaluatorOptions = {},
): EvaluatorOptions {
  return {
    depthBudget: config.evaluation.depthBudget,
    fallback: defaultFallbackPolicy({
      variance: config.fallback.vagueVariance,
      gammaShape: config.fallback.gammaShape,
      gammaRate: config.fallback.gammaRate,
    }),
    ...overrides,
  };
}

export function loggerConfigFromEngineConfig(config: EngineConfig): LoggerConfig {
  return {
    level: config.logging.level,
    ...(config.logging.file === undefined ? {} : { logFilePath: config.logging.file }),
  };
}
