import { makeBiPredicate, makePredicate, makeTriPredicate } from "./core.mjs";
import { requireFunction } from "./errors.mjs";
import { labelOf } from "./format.mjs";
import type {
  BiPredicate,
  BiPredicateFn,
  Predicate,
  PredicateFn,
  TriPredicate,
  TriPredicateFn,
} from "./types.mjs";

/**
 * Lifts a plain function into a named unary predicate.
 * @description Without a label the function's own name is used.
 *
 * @example
 * const isEven = predicate((n: number) => n % 2 === 0, 'even');
 * isEven.negate()(3);        // => true
 * String(isEven.negate());   // => 'NOT even'
 */
export const predicate = <T,>(fn: PredicateFn<T>, label?: string): Predicate<T> => {
  const wrapped = requireFunction(fn, "fn");
  return makePredicate((t: T) => wrapped(t), {
    kind: "lifted",
    label: label ?? labelOf(wrapped),
  });
};

/**
 * Lifts a plain function into a named binary predicate.
 */
export const biPredicate = <T, U>(fn: BiPredicateFn<T, U>, label?: string): BiPredicate<T, U> => {
  const wrapped = requireFunction(fn, "fn");
  return makeBiPredicate((t: T, u: U) => wrapped(t, u), {
    kind: "lifted",
    label: label ?? labelOf(wrapped),
  });
};

/**
 * Lifts a plain function into a named ternary predicate.
 *
 * @example
 * const between = triPredicate((n: number, lo: number, hi: number) => n >= lo && n <= hi, 'between');
 * const percentage = between.withArg2(0).withArg2(100);
 * percentage(42);           // => true
 */
export const triPredicate = <T, U, V>(
  fn: TriPredicateFn<T, U, V>,
  label?: string,
): TriPredicate<T, U, V> => {
  const wrapped = requireFunction(fn, "fn");
  return makeTriPredicate((t: T, u: U, v: V) => wrapped(t, u, v), {
    kind: "lifted",
    label: label ?? labelOf(wrapped),
  });
};
