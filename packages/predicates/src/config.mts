/**
 * Package-wide defaults used by evaluation tracing
 */

import { InvalidArgumentError } from "./errors.mjs";
import { createLogger, isLoggerLevel } from "./logger.mjs";
import type { BaseLogger, LoggerLevels } from "./logger.mjs";

export interface PredicatesConfiguration {
  /** Destination of trace entries */
  readonly logger: BaseLogger;
  /** Level trace entries are written at */
  readonly traceLevel: LoggerLevels;
}

export const LOG_LEVEL_ENV = "ARITY_LOG_LEVEL";

const DEFAULT_LOG_LEVEL: LoggerLevels = "info";
const DEFAULT_TRACE_LEVEL: LoggerLevels = "debug";

/**
 * Reads the logger level from the environment, ignoring unknown values.
 */
export const resolveLogLevel = (
  env: NodeJS.ProcessEnv = process.env,
): LoggerLevels => {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return isLoggerLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
};

const createDefaultConfiguration = (): PredicatesConfiguration =>
  Object.freeze({
    logger: createLogger({ level: resolveLogLevel() }),
    traceLevel: DEFAULT_TRACE_LEVEL,
  });

let current: PredicatesConfiguration | undefined;

/**
 * Current defaults; the axe-backed logger is created on first use.
 */
export const getConfiguration = (): PredicatesConfiguration =>
  (current ??= createDefaultConfiguration());

/**
 * Replaces some of the defaults. Predicates already built keep the logger
 * and level they were built with.
 * @throws {InvalidArgumentError} on an unknown level or a logger missing a level method
 */
export const configure = (
  overrides: Partial<PredicatesConfiguration>,
): PredicatesConfiguration => {
  const base = getConfiguration();
  const traceLevel = overrides.traceLevel ?? base.traceLevel;
  const logger = overrides.logger ?? base.logger;

  if (!isLoggerLevel(traceLevel)) {
    throw new InvalidArgumentError("traceLevel", traceLevel, "a logger level");
  }
  if (typeof logger[traceLevel] !== "function") {
    throw new InvalidArgumentError("logger", logger, `a logger with a '${traceLevel}' method`);
  }

  current = Object.freeze({ logger, traceLevel });
  return current;
};

export const resetConfiguration = (): void => {
  current = undefined;
};
