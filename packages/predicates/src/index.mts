/**
 * @arity/predicates - Named predicate combinators of arity 1, 2 and 3
 */

export * from "./adapters.mjs";
export * from "./config.mjs";
export * from "./constants.mjs";
export * from "./errors.mjs";
export * from "./lift.mjs";
export * from "./logger.mjs";
export * from "./tracing.mjs";
export * from "./types.mjs";
export { formatValue } from "./format.mjs";
export { isNamedPredicate, predicateEquals } from "./registry.mjs";
