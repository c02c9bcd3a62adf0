import { describe, expect, it } from "vitest";

import {
  always,
  alwaysFalse,
  alwaysTrue,
  biAlways,
  biAlwaysFalse,
  biAlwaysTrue,
  triAlways,
  triAlwaysFalse,
  triAlwaysTrue,
} from "./constants.mjs";

describe("constants", () => {
  describe("alwaysTrue / alwaysFalse", () => {
    it("should ignore the argument", () => {
      expect(alwaysTrue<unknown>()(42)).toBe(true);
      expect(alwaysTrue<unknown>().test("anything")).toBe(true);
      expect(alwaysFalse<unknown>()(null)).toBe(false);
      expect(alwaysFalse<unknown>().test({ a: 1 })).toBe(false);
    });

    it("should negate to the opposite constant result", () => {
      expect(alwaysFalse<number>().negate().test(7)).toBe(true);
      expect(alwaysTrue<number>().negate().test(7)).toBe(false);
    });

    it("should print TRUE and FALSE", () => {
      expect(String(alwaysTrue())).toBe("TRUE");
      expect(alwaysFalse().toString()).toBe("FALSE");
      expect(alwaysTrue().label).toBe("TRUE");
    });

    it("should work as an array filter", () => {
      expect([1, 2, 3].filter(alwaysTrue<number>())).toEqual([1, 2, 3]);
      expect([1, 2, 3].filter(alwaysFalse<number>())).toEqual([]);
    });

    it("should report arity 1 and kind constant", () => {
      const predicate = alwaysTrue();
      expect(predicate.arity).toBe(1);
      expect(predicate.kind).toBe("constant");
    });
  });

  describe("equality", () => {
    it("should treat independently built constants with the same value as equal", () => {
      const a = alwaysTrue<string>();
      const b = alwaysTrue<string>();

      expect(a).not.toBe(b);
      expect(a.equals(b)).toBe(true);
      expect(b.equals(a)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    it("should ignore the label", () => {
      const custom = always<number>(false, "never");

      expect(String(custom)).toBe("never");
      expect(custom.equals(alwaysFalse<number>())).toBe(true);
      expect(custom.hashCode()).toBe(alwaysFalse<number>().hashCode());
    });

    it("should hash true as 1 and false as 0", () => {
      expect(alwaysTrue().hashCode()).toBe(1);
      expect(biAlwaysFalse().hashCode()).toBe(0);
      expect(triAlways(true, "yes").hashCode()).toBe(1);
    });

    it("should not equal a constant with a different value", () => {
      expect(alwaysTrue().equals(alwaysFalse())).toBe(false);
      expect(biAlwaysTrue().equals(biAlwaysFalse())).toBe(false);
      expect(triAlwaysTrue().equals(triAlwaysFalse())).toBe(false);
    });

    it("should not equal a constant of another arity", () => {
      expect(alwaysTrue().equals(biAlwaysTrue())).toBe(false);
      expect(biAlwaysTrue().equals(triAlwaysTrue())).toBe(false);
      expect(triAlwaysFalse().equals(alwaysFalse())).toBe(false);
    });

    it("should not equal a non-constant predicate or a plain function", () => {
      expect(alwaysTrue().equals(alwaysFalse().negate())).toBe(false);
      expect(alwaysTrue().equals(() => true)).toBe(false);
      expect(alwaysTrue().equals(true)).toBe(false);
      expect(alwaysTrue().equals(null)).toBe(false);
    });

    it("should be reflexive and transitive", () => {
      const a = biAlways(true, "a");
      const b = biAlways(true, "b");
      const c = biAlwaysTrue();

      expect(a.equals(a)).toBe(true);
      expect(a.equals(b) && b.equals(c)).toBe(true);
      expect(a.equals(c)).toBe(true);
    });
  });

  describe("biAlways", () => {
    it("should ignore both arguments", () => {
      expect(biAlwaysTrue<number, string>()(1, "x")).toBe(true);
      expect(biAlwaysFalse<number, string>().test(1, "x")).toBe(false);
      expect(biAlways<number, number>(true, "custom")(0, 0)).toBe(true);
    });

    it("should report arity 2", () => {
      expect(biAlwaysTrue().arity).toBe(2);
      expect(String(biAlwaysTrue())).toBe("TRUE");
    });
  });

  describe("triAlways", () => {
    it("should ignore all three arguments", () => {
      expect(triAlwaysTrue<number, string, boolean>()(1, "x", false)).toBe(true);
      expect(triAlwaysFalse<number, string, boolean>().test(1, "x", true)).toBe(false);
      expect(triAlways<null, null, null>(false, "off")(null, null, null)).toBe(false);
    });

    it("should report arity 3 and its label", () => {
      expect(triAlwaysFalse().arity).toBe(3);
      expect(String(triAlways(false, "off"))).toBe("off");
    });
  });

  it("should freeze the predicate", () => {
    const predicate = alwaysTrue();
    expect(Object.isFrozen(predicate)).toBe(true);
  });
});
