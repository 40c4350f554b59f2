/**
 * Structured Logging Module
 *
 * Structured JSON logging through pino, on stderr and optionally on a file.
 * Named loggers share one root; `setupLogger` rebuilds the root, and loggers
 * obtained earlier through `getLogger` pick up the new configuration.
 *
 * Both destinations write synchronously, so logging never leaves pending
 * work behind when a process or a test run ends.
 *
 * @module telemetry/logger
 */

import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger as PinoLogger } from "pino";

/**
 * Log levels accepted by `setupLogger`
 */
export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerConfig {
  /** Minimum level written to every destination (default "info") */
  level?: LogLevel;
  /** JSON log file; parent directories are created */
  logFilePath?: string;
  /** Write to stderr (default true) */
  console?: boolean;
}

/**
 * Logging capability accepted by the engine
 */
export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export type LoggerName = "default" | "engine" | "invalidation" | "config";

type EmitLevel = keyof Logger;

// =============================================================================
// Root logger
// =============================================================================

let fileDestination: ReturnType<typeof pino.destination> | undefined;
let root: PinoLogger = createRoot({});
const children = new Map<LoggerName, PinoLogger>();

function createRoot(config: LoggerConfig): PinoLogger {
  const level = config.level ?? "info";
  const streams: pino.StreamEntry[] = [];

  if (config.console ?? true) {
    streams.push({ level: "trace", stream: pino.destination({ dest: 2, sync: true }) });
  }
  if (config.logFilePath !== undefined) {
    fileDestination = pino.destination({ dest: config.logFilePath, sync: true, mkdir: true });
    streams.push({ level: "trace", stream: fileDestination });
  }

  const destination: DestinationStream = pino.multistream(streams);
  return pino(
    {
      level: streams.length === 0 ? "silent" : level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

/**
 * Initialize the logging system
 *
 * Replaces the destinations of every named logger. A previously opened log
 * file is flushed and closed.
 */
export function setupLogger(config: LoggerConfig = {}): void {
  if (fileDestination !== undefined) {
    fileDestination.flushSync();
    fileDestination.end();
    fileDestination = undefined;
  }
  root = createRoot(config);
  children.clear();

  root.debug({ logFile: config.logFilePath, level: root.level }, "Logging initialized");
}

function pinoFor(name: LoggerName): PinoLogger {
  let child = children.get(name);
  if (child === undefined) {
    child = root.child({ logger: name });
    children.set(name, child);
  }
  return child;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function emit(name: LoggerName, level: EmitLevel, msg: string, args: unknown[]): void {
  const target = pinoFor(name);
  if (!target.isLevelEnabled(level)) return;

  const [first] = args;
  if (args.length === 0) {
    target[level](msg);
  } else if (args.length === 1 && first instanceof Error) {
    target[level]({ err: first }, msg);
  } else if (args.length === 1 && isRecord(first)) {
    target[level](first, msg);
  } else {
    target[level]({ args }, msg);
  }
}

// =============================================================================
// Named loggers
// =============================================================================

/**
 * Get logger instance by name
 *
 * A trailing object argument is merged into the JSON record, an Error is
 * recorded under `err`, anything else under `args`.
 */
export function getLogger(name: LoggerName = "default"): Logger {
  return {
    debug: (msg, ...args) => emit(name, "debug", msg, args),
    info: (msg, ...args) => emit(name, "info", msg, args),
    warn: (msg, ...args) => emit(name, "warn", msg, args),
    error: (msg, ...args) => emit(name, "error", msg, args),
  };
}

/**
 * Log convenience functions for default logger
 */
export const logger: Logger = getLogger("default");

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
