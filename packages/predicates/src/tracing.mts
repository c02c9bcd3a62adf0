/**
 * @module tracing
 * @description Wrappers that log every evaluation of a predicate (its label,
 * the arguments and the result) through the package logger. Handy when a
 * composed rule says "no" and you need to know which branch did it.
 *
 * @example
 * ```typescript
 * const isAdult = traced(predicate((age: number) => age >= 18, 'adult'));
 * isAdult(12);
 * // debug: predicate 'adult' evaluated { predicate: 'adult', args: [12], result: false }
 * ```
 *
 * @since 2025-07-03
 */

import { getConfiguration } from "./config.mjs";
import { makeBiPredicate, makePredicate, makeTriPredicate } from "./core.mjs";
import { requireFunction } from "./errors.mjs";
import { formatValue, labelOf } from "./format.mjs";
import type { BaseLogger, LoggerLevels, LoggerMeta } from "./logger.mjs";
import type {
  BiPredicate,
  BiPredicateFn,
  Predicate,
  PredicateFn,
  TriPredicate,
  TriPredicateFn,
} from "./types.mjs";

export interface TraceOptions {
  /** Overrides the configured logger */
  logger?: BaseLogger;
  /** Overrides the configured trace level */
  level?: LoggerLevels;
}

const tracer = (fn: { readonly name: string }, options: TraceOptions) => {
  const config = getConfiguration();
  const logger = options.logger ?? config.logger;
  const level = options.level ?? config.traceLevel;
  const label = labelOf(fn);

  // a failing logger must never replace the predicate's own result or error
  const write = (entryLevel: LoggerLevels, message: string, meta: LoggerMeta): void => {
    try {
      logger[entryLevel](message, meta);
    } catch (failure) {
      process.emitWarning(
        `trace entry for predicate '${label}' was dropped: ${failure instanceof Error ? failure.message : formatValue(failure)}`,
        "PredicateTraceWarning",
      );
    }
  };

  return {
    label: `traced ${label}`,
    evaluate: (args: readonly unknown[], run: () => boolean): boolean => {
      let result: boolean;
      try {
        result = run();
      } catch (error) {
        write("error", `predicate '${label}' threw`, { predicate: label, args, error });
        throw error;
      }
      write(level, `predicate '${label}' evaluated`, { predicate: label, args, result });
      return result;
    },
  };
};

/**
 * Unary predicate that logs each evaluation of `fn`.
 * @throws {InvalidArgumentError} when `fn` is missing
 */
export const traced = <T,>(fn: PredicateFn<T>, options: TraceOptions = {}): Predicate<T> => {
  const wrapped = requireFunction(fn, "predicate");
  const { label, evaluate } = tracer(wrapped, options);
  return makePredicate((t: T) => evaluate([t], () => wrapped(t)), { kind: "traced", label });
};

/**
 * Binary predicate that logs each evaluation of `fn`.
 * @throws {InvalidArgumentError} when `fn` is missing
 */
export const biTraced = <T, U>(
  fn: BiPredicateFn<T, U>,
  options: TraceOptions = {},
): BiPredicate<T, U> => {
  const wrapped = requireFunction(fn, "biPredicate");
  const { label, evaluate } = tracer(wrapped, options);
  return makeBiPredicate((t: T, u: U) => evaluate([t, u], () => wrapped(t, u)), {
    kind: "traced",
    label,
  });
};

/**
 * Ternary predicate that logs each evaluation of `fn`.
 * @throws {InvalidArgumentError} when `fn` is missing
 */
export const triTraced = <T, U, V>(
  fn: TriPredicateFn<T, U, V>,
  options: TraceOptions = {},
): TriPredicate<T, U, V> => {
  const wrapped = requireFunction(fn, "triPredicate");
  const { label, evaluate } = tracer(wrapped, options);
  return makeTriPredicate((t: T, u: U, v: V) => evaluate([t, u, v], () => wrapped(t, u, v)), {
    kind: "traced",
    label,
  });
};
