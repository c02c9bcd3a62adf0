/**
 * @module core
 * @description Builders that turn an evaluation function into a named
 * predicate of arity 1, 2 or 3, attaching the combinators (`and`, `or`,
 * `negate`) and, for arity 2 and 3, the argument-binding methods.
 *
 * Every builder returns a frozen callable; the evaluation function is
 * captured once and never replaced.
 *
 * @since 2025-07-03
 */

import { requireFunction } from "./errors.mjs";
import { formatValue, labelOf } from "./format.mjs";
import { constantValueOf, isNamedPredicate, issueIdentity, register } from "./registry.mjs";
import type {
  Arity,
  BiPredicate,
  BiPredicateFn,
  Named,
  Predicate,
  PredicateFn,
  PredicateKind,
  TriPredicate,
  TriPredicateFn,
} from "./types.mjs";

export interface Descriptor {
  readonly kind: PredicateKind;
  readonly label: string;
  /** Fixed result; set for constants only */
  readonly constant?: boolean;
}

const namedMembers = <A extends Arity>(
  arity: A,
  descriptor: Descriptor,
  self: () => unknown,
): Named<A> => {
  const { kind, label, constant } = descriptor;
  const hash = constant === undefined ? issueIdentity() : constant ? 1 : 0;

  return {
    arity,
    kind,
    label,
    toString: () => label,
    equals: (other: unknown): boolean => {
      if (other === self()) return true;
      if (constant === undefined || !isNamedPredicate(other)) return false;
      return other.arity === arity && constantValueOf(other) === constant;
    },
    hashCode: () => hash,
  };
};

const seal = <F extends (...args: never[]) => boolean, M extends object>(
  fn: F,
  members: M,
  descriptor: Descriptor,
): F & M => {
  const sealed = Object.freeze(Object.assign(fn, members));
  register(sealed, descriptor.constant);
  return sealed;
};

const andLabel = (left: string, right: { readonly name: string }) =>
  `(${left} AND ${labelOf(right)})`;
const orLabel = (left: string, right: { readonly name: string }) =>
  `(${left} OR ${labelOf(right)})`;
const bindLabel = (position: 1 | 2 | 3, value: unknown) =>
  `with arg${position} ${formatValue(value)}`;

/**
 * Builds a named unary predicate around `evaluate`.
 */
export const makePredicate = <T,>(
  evaluate: PredicateFn<T>,
  descriptor: Descriptor,
): Predicate<T> => {
  const self: Predicate<T> = seal(
    (t: T): boolean => evaluate(t),
    {
      ...namedMembers(1, descriptor, () => self),
      test: (t: T): boolean => evaluate(t),
      and: (other: PredicateFn<T>): Predicate<T> => {
        const right = requireFunction(other, "other");
        return makePredicate((t: T) => evaluate(t) && right(t), {
          kind: "and",
          label: andLabel(descriptor.label, right),
        });
      },
      or: (other: PredicateFn<T>): Predicate<T> => {
        const right = requireFunction(other, "other");
        return makePredicate((t: T) => evaluate(t) || right(t), {
          kind: "or",
          label: orLabel(descriptor.label, right),
        });
      },
      negate: (): Predicate<T> =>
        makePredicate((t: T) => !evaluate(t), {
          kind: "negate",
          label: `NOT ${descriptor.label}`,
        }),
    },
    descriptor,
  );
  return self;
};

/**
 * Binds the first argument of `evaluate`.
 */
export const bindFirst = <T, U>(evaluate: BiPredicateFn<T, U>, t: T): Predicate<U> =>
  makePredicate((u: U) => evaluate(t, u), { kind: "bind", label: bindLabel(1, t) });

/**
 * Binds the second argument of `evaluate`.
 */
export const bindSecond = <T, U>(evaluate: BiPredicateFn<T, U>, u: U): Predicate<T> =>
  makePredicate((t: T) => evaluate(t, u), { kind: "bind", label: bindLabel(2, u) });

/**
 * Builds a named binary predicate around `evaluate`.
 */
export const makeBiPredicate = <T, U>(
  evaluate: BiPredicateFn<T, U>,
  descriptor: Descriptor,
): BiPredicate<T, U> => {
  const self: BiPredicate<T, U> = seal(
    (t: T, u: U): boolean => evaluate(t, u),
    {
      ...namedMembers(2, descriptor, () => self),
      test: (t: T, u: U): boolean => evaluate(t, u),
      and: (other: BiPredicateFn<T, U>): BiPredicate<T, U> => {
        const right = requireFunction(other, "other");
        return makeBiPredicate((t: T, u: U) => evaluate(t, u) && right(t, u), {
          kind: "and",
          label: andLabel(descriptor.label, right),
        });
      },
      or: (other: BiPredicateFn<T, U>): BiPredicate<T, U> => {
        const right = requireFunction(other, "other");
        return makeBiPredicate((t: T, u: U) => evaluate(t, u) || right(t, u), {
          kind: "or",
          label: orLabel(descriptor.label, right),
        });
      },
      negate: (): BiPredicate<T, U> =>
        makeBiPredicate((t: T, u: U) => !evaluate(t, u), {
          kind: "negate",
          label: `NOT ${descriptor.label}`,
        }),
      withArg1: (t: T): Predicate<U> => bindFirst(evaluate, t),
      withArg2: (u: U): Predicate<T> => bindSecond(evaluate, u),
    },
    descriptor,
  );
  return self;
};

/**
 * Builds a named ternary predicate around `evaluate`.
 */
export const makeTriPredicate = <T, U, V>(
  evaluate: TriPredicateFn<T, U, V>,
  descriptor: Descriptor,
): TriPredicate<T, U, V> => {
  const self: TriPredicate<T, U, V> = seal(
    (t: T, u: U, v: V): boolean => evaluate(t, u, v),
    {
      ...namedMembers(3, descriptor, () => self),
      test: (t: T, u: U, v: V): boolean => evaluate(t, u, v),
      and: (other: TriPredicateFn<T, U, V>): TriPredicate<T, U, V> => {
        const right = requireFunction(other, "other");
        return makeTriPredicate(
          (t: T, u: U, v: V) => evaluate(t, u, v) && right(t, u, v),
          { kind: "and", label: andLabel(descriptor.label, right) },
        );
      },
      or: (other: TriPredicateFn<T, U, V>): TriPredicate<T, U, V> => {
        const right = requireFunction(other, "other");
        return makeTriPredicate(
          (t: T, u: U, v: V) => evaluate(t, u, v) || right(t, u, v),
          { kind: "or", label: orLabel(descriptor.label, right) },
        );
      },
      negate: (): TriPredicate<T, U, V> =>
        makeTriPredicate((t: T, u: U, v: V) => !evaluate(t, u, v), {
          kind: "negate",
          label: `NOT ${descriptor.label}`,
        }),
      withArg1: (t: T): BiPredicate<U, V> =>
        makeBiPredicate((u: U, v: V) => evaluate(t, u, v), {
          kind: "bind",
          label: bindLabel(1, t),
        }),
      withArg2: (u: U): BiPredicate<T, V> =>
        makeBiPredicate((t: T, v: V) => evaluate(t, u, v), {
          kind: "bind",
          label: bindLabel(2, u),
        }),
      withArg3: (v: V): BiPredicate<T, U> =>
        makeBiPredicate((t: T, u: U) => evaluate(t, u, v), {
          kind: "bind",
          label: bindLabel(3, v),
        }),
    },
    descriptor,
  );
  return self;
};
