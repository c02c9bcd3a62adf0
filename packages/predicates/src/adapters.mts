/**
 * @module adapters
 * @description Reshape predicates between arities.
 *
 * - `ignoreArg*` / `triIgnoreArg*` raise the arity: the new predicate drops
 *   one incoming argument and forwards the rest, in order.
 * - `withArg*` lowers the arity: one argument is fixed to a stored value and
 *   the call's own arguments fill the remaining positions.
 *
 * Ternary predicates bind through their own `withArg1/2/3` methods.
 *
 * @example
 * ```typescript
 * const same = (a: number, b: number) => a === b;
 *
 * withArg1(same, 5)(5);                    // => true
 * String(withArg1(same, 5));               // => 'with arg1 5'
 * triIgnoreArg3<number, number, string>(same)(1, 1, 'ignored'); // => true
 * ```
 *
 * @since 2025-07-03
 */

import { bindFirst, bindSecond, makeBiPredicate, makeTriPredicate } from "./core.mjs";
import { requireFunction } from "./errors.mjs";
import type { BiPredicate, BiPredicateFn, Predicate, PredicateFn, TriPredicate } from "./types.mjs";

/**
 * Ternary predicate implemented by a binary one, ignoring the first argument.
 * @throws {InvalidArgumentError} when `biPredicate` is missing
 */
export const triIgnoreArg1 = <T, U, V>(biPredicate: BiPredicateFn<U, V>): TriPredicate<T, U, V> => {
  const wrapped = requireFunction(biPredicate, "biPredicate");
  return makeTriPredicate((_t: T, u: U, v: V) => wrapped(u, v), {
    kind: "ignore",
    label: "ignore arg1",
  });
};

/**
 * Ternary predicate implemented by a binary one, ignoring the second argument.
 * @throws {InvalidArgumentError} when `biPredicate` is missing
 */
export const triIgnoreArg2 = <T, U, V>(biPredicate: BiPredicateFn<T, V>): TriPredicate<T, U, V> => {
  const wrapped = requireFunction(biPredicate, "biPredicate");
  return makeTriPredicate((t: T, _u: U, v: V) => wrapped(t, v), {
    kind: "ignore",
    label: "ignore arg2",
  });
};

/**
 * Ternary predicate implemented by a binary one, ignoring the third argument.
 * @throws {InvalidArgumentError} when `biPredicate` is missing
 */
export const triIgnoreArg3 = <T, U, V>(biPredicate: BiPredicateFn<T, U>): TriPredicate<T, U, V> => {
  const wrapped = requireFunction(biPredicate, "biPredicate");
  return makeTriPredicate((t: T, u: U, _v: V) => wrapped(t, u), {
    kind: "ignore",
    label: "ignore arg3",
  });
};

/**
 * Binary predicate implemented by a unary one, ignoring the first argument.
 * @throws {InvalidArgumentError} when `predicate` is missing
 */
export const ignoreArg1 = <T, U>(predicate: PredicateFn<U>): BiPredicate<T, U> => {
  const wrapped = requireFunction(predicate, "predicate");
  return makeBiPredicate((_t: T, u: U) => wrapped(u), {
    kind: "ignore",
    label: "ignore arg1",
  });
};

/**
 * Binary predicate implemented by a unary one, ignoring the second argument.
 * @throws {InvalidArgumentError} when `predicate` is missing
 */
export const ignoreArg2 = <T, U>(predicate: PredicateFn<T>): BiPredicate<T, U> => {
  const wrapped = requireFunction(predicate, "predicate");
  return makeBiPredicate((t: T, _u: U) => wrapped(t), {
    kind: "ignore",
    label: "ignore arg2",
  });
};

/**
 * Fixes the first argument of a binary predicate.
 * @throws {InvalidArgumentError} when `biPredicate` is missing
 *
 * @example
 * const isAdult = withArg1((min: number, age: number) => age >= min, 18);
 * isAdult(21);         // => true
 * String(isAdult);     // => 'with arg1 18'
 */
export const withArg1 = <T, U>(biPredicate: BiPredicateFn<T, U>, t: T): Predicate<U> =>
  bindFirst(requireFunction(biPredicate, "biPredicate"), t);

/**
 * Fixes the second argument of a binary predicate.
 * @throws {InvalidArgumentError} when `biPredicate` is missing
 */
export const withArg2 = <T, U>(biPredicate: BiPredicateFn<T, U>, u: U): Predicate<T> =>
  bindSecond(requireFunction(biPredicate, "biPredicate"), u);
