/**
 * @module types
 * @description Shared shapes for named predicates of arity 1, 2 and 3.
 * A named predicate is a plain callable (so it drops straight into
 * `Array.prototype.filter`) that also carries a label, a kind and the
 * `equals` / `hashCode` pair used to compare predicates by meaning.
 *
 * @since 2025-07-03
 */

/**
 * Number of arguments a predicate accepts.
 */
export type Arity = 1 | 2 | 3;

/**
 * What a named predicate was built from.
 * @description Only `constant` predicates compare by value; every other kind
 * compares by identity.
 */
export type PredicateKind =
  | "constant"
  | "lifted"
  | "ignore"
  | "bind"
  | "and"
  | "or"
  | "negate"
  | "traced";

export type PredicateFn<T> = (t: T) => boolean;
export type BiPredicateFn<T, U> = (t: T, u: U) => boolean;
export type TriPredicateFn<T, U, V> = (t: T, u: U, v: V) => boolean;

/**
 * Members every named predicate carries, whatever its arity.
 */
export interface Named<A extends Arity> {
  readonly arity: A;
  readonly kind: PredicateKind;
  /** Display label, also returned by `toString()` */
  readonly label: string;
  toString(): string;
  /**
   * Constants are equal to constants of the same arity and value;
   * anything else is only equal to itself.
   */
  equals(other: unknown): boolean;
  hashCode(): number;
}

export interface Predicate<T> extends Named<1> {
  (t: T): boolean;
  test(t: T): boolean;
  and(other: PredicateFn<T>): Predicate<T>;
  or(other: PredicateFn<T>): Predicate<T>;
  negate(): Predicate<T>;
}

export interface BiPredicate<T, U> extends Named<2> {
  (t: T, u: U): boolean;
  test(t: T, u: U): boolean;
  and(other: BiPredicateFn<T, U>): BiPredicate<T, U>;
  or(other: BiPredicateFn<T, U>): BiPredicate<T, U>;
  negate(): BiPredicate<T, U>;
  /** Fixes the first argument, leaving a predicate on the second. */
  withArg1(t: T): Predicate<U>;
  /** Fixes the second argument, leaving a predicate on the first. */
  withArg2(u: U): Predicate<T>;
}

export interface TriPredicate<T, U, V> extends Named<3> {
  (t: T, u: U, v: V): boolean;
  test(t: T, u: U, v: V): boolean;
  /**
   * Short-circuiting AND: `other` is not evaluated when this predicate is false.
   * @throws {InvalidArgumentError} when `other` is missing
   */
  and(other: TriPredicateFn<T, U, V>): TriPredicate<T, U, V>;
  /**
   * Short-circuiting OR: `other` is not evaluated when this predicate is true.
   * @throws {InvalidArgumentError} when `other` is missing
   */
  or(other: TriPredicateFn<T, U, V>): TriPredicate<T, U, V>;
  negate(): TriPredicate<T, U, V>;
  withArg1(t: T): BiPredicate<U, V>;
  withArg2(u: U): BiPredicate<T, V>;
  withArg3(v: V): BiPredicate<T, U>;
}

/**
 * Any predicate built by this package, with its argument types erased.
 */
export type AnyPredicate =
  | Predicate<never>
  | BiPredicate<never, never>
  | TriPredicate<never, never, never>;
