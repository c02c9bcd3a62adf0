import { describe, expect, it } from "vitest";

import { withArg1 } from "./adapters.mjs";
import { alwaysFalse, alwaysTrue, biAlwaysTrue } from "./constants.mjs";
import { constantValueOf, isNamedPredicate, predicateEquals } from "./registry.mjs";

describe("registry", () => {
  describe("isNamedPredicate", () => {
    it("should recognise predicates built by the package", () => {
      expect(isNamedPredicate(alwaysTrue())).toBe(true);
      expect(isNamedPredicate(biAlwaysTrue().withArg1(1))).toBe(true);
      expect(isNamedPredicate(withArg1((a: number, b: number) => a < b, 1))).toBe(true);
    });

    it("should reject plain functions and other values", () => {
      expect(isNamedPredicate((n: number) => n > 0)).toBe(false);
      expect(isNamedPredicate({ label: "TRUE", arity: 1 })).toBe(false);
      expect(isNamedPredicate(null)).toBe(false);
    });
  });

  describe("constantValueOf", () => {
    it("should return the value of constants only", () => {
      expect(constantValueOf(alwaysTrue())).toBe(true);
      expect(constantValueOf(alwaysFalse())).toBe(false);
      expect(constantValueOf(alwaysFalse().negate())).toBeUndefined();
      expect(constantValueOf(() => true)).toBeUndefined();
    });
  });

  describe("predicateEquals", () => {
    it("should use value equality for constants", () => {
      expect(predicateEquals(alwaysTrue(), alwaysTrue())).toBe(true);
      expect(predicateEquals(alwaysTrue(), alwaysFalse())).toBe(false);
    });

    it("should fall back to identity for other values", () => {
      const fn = () => true;

      expect(predicateEquals(fn, fn)).toBe(true);
      expect(predicateEquals(fn, () => true)).toBe(false);
      expect(predicateEquals(fn, alwaysTrue())).toBe(false);
      expect(predicateEquals("a", "a")).toBe(true);
    });
  });
});
