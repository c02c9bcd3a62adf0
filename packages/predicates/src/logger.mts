import Axe from "axe";

export const LOGGER_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LoggerLevels = (typeof LOGGER_LEVELS)[number];
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

/**
 * Package logger; `axe` is exposed for level changes at run time.
 */
export interface PredicateLogger extends BaseLogger {
  readonly axe: Axe;
}

export type LoggerOptions = Axe.Options;

export const isLoggerLevel = (value: unknown): value is LoggerLevels =>
  typeof value === "string" && LOGGER_LEVELS.some((level) => level === value);

/**
 * Creates the axe-backed logger trace entries are written to.
 * Unless overridden, all six levels are enabled and app info parsing is off.
 */
export const createLogger = (options: LoggerOptions = {}): PredicateLogger => {
  const axe = new Axe({
    levels: [...LOGGER_LEVELS],
    appInfo: false,
    ...options,
  });

  //axe resolves once the entry went through its hooks; entries are fire-and-forget here
  const writer =
    (level: LoggerLevels) =>
    (message: LoggerMessage, meta?: LoggerMeta): void => {
      void axe[level](message, meta);
    };

  return {
    axe,
    trace: writer("trace"),
    debug: writer("debug"),
    info: writer("info"),
    warn: writer("warn"),
    error: writer("error"),
    fatal: writer("fatal"),
  };
};
