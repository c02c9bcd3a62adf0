/**
 * @module constants
 * @description Predicates that ignore their arguments and always return the
 * same boolean. Unlike `(x) => true`, two constants of the same arity and
 * value are `equals` to each other, share a `hashCode`, and print a
 * readable label.
 *
 * ### Decision Tree
 * - Need a default filter that keeps everything? `alwaysTrue()`.
 * - Need one that keeps nothing? `alwaysFalse()`.
 * - Comparing pairs or triples? Use the `bi` / `tri` variants.
 * - Want a custom label in logs? `always(value, label)`.
 *
 * @example
 * ```typescript
 * import { alwaysTrue, triAlwaysFalse } from './constants.mts';
 *
 * const keepAll = alwaysTrue<string>();
 * ['a', 'b'].filter(keepAll);                   // => ['a', 'b']
 * String(triAlwaysFalse());                     // => 'FALSE'
 * alwaysTrue().equals(always(true, 'yes'));     // => true
 * ```
 *
 * @category Constants
 * @since 2025-07-03
 */

import { makeBiPredicate, makePredicate, makeTriPredicate } from "./core.mjs";
import type { BiPredicate, Predicate, TriPredicate } from "./types.mjs";

const TRUE = "TRUE";
const FALSE = "FALSE";

/**
 * Unary predicate with a fixed result.
 * @description The label only affects `toString()`; equality looks at the
 * value alone.
 *
 * @example
 * const open = always(true, 'gate open');
 * open(42);          // => true
 * String(open);      // => 'gate open'
 */
export const always = <T,>(value: boolean, label: string): Predicate<T> =>
  makePredicate<T>(() => value, { kind: "constant", label, constant: value });

export const alwaysTrue = <T,>(): Predicate<T> => always<T>(true, TRUE);

export const alwaysFalse = <T,>(): Predicate<T> => always<T>(false, FALSE);

/**
 * Binary predicate with a fixed result.
 */
export const biAlways = <T, U>(value: boolean, label: string): BiPredicate<T, U> =>
  makeBiPredicate<T, U>(() => value, { kind: "constant", label, constant: value });

export const biAlwaysTrue = <T, U>(): BiPredicate<T, U> => biAlways<T, U>(true, TRUE);

export const biAlwaysFalse = <T, U>(): BiPredicate<T, U> => biAlways<T, U>(false, FALSE);

/**
 * Ternary predicate with a fixed result.
 */
export const triAlways = <T, U, V>(value: boolean, label: string): TriPredicate<T, U, V> =>
  makeTriPredicate<T, U, V>(() => value, { kind: "constant", label, constant: value });

export const triAlwaysTrue = <T, U, V>(): TriPredicate<T, U, V> =>
  triAlways<T, U, V>(true, TRUE);

export const triAlwaysFalse = <T, U, V>(): TriPredicate<T, U, V> =>
  triAlways<T, U, V>(false, FALSE);
