import type { AnyPredicate } from "./types.mjs";

// every predicate this package builds, and the value of each constant
const built = new WeakSet<object>();
const constantValues = new WeakMap<object, boolean>();

let nextIdentity = 1;

export const register = (predicate: object, constant?: boolean): void => {
  built.add(predicate);
  if (constant !== undefined) {
    constantValues.set(predicate, constant);
  }
};

/**
 * Issues the hash code of a predicate that compares by identity.
 */
export const issueIdentity = (): number => nextIdentity++;

/**
 * The fixed result of a constant predicate, `undefined` for any other value.
 */
export const constantValueOf = (value: unknown): boolean | undefined =>
  typeof value === "function" ? constantValues.get(value) : undefined;

/**
 * Type guard for predicates built by this package.
 * @description Plain functions, even ones that return booleans, are not
 * named predicates.
 *
 * @example
 * isNamedPredicate(alwaysTrue());   // => true
 * isNamedPredicate((n: number) => n > 0); // => false
 */
export const isNamedPredicate = (value: unknown): value is AnyPredicate =>
  typeof value === "function" && built.has(value);

/**
 * Equality that also accepts values not built by this package.
 * @description Delegates to `equals` for named predicates and falls back to
 * identity otherwise.
 */
export const predicateEquals = (a: unknown, b: unknown): boolean =>
  isNamedPredicate(a) ? a.equals(b) : a === b;
