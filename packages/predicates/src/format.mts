import { isNamedPredicate } from "./registry.mjs";

/**
 * Label of a collaborator: its own label when it is a named predicate, else
 * the function's name.
 */
export const labelOf = (fn: { readonly name: string }): string => {
  if (isNamedPredicate(fn)) return fn.label;
  return fn.name === "" ? "anonymous" : fn.name;
};

// undefined when rendering throws: a cyclic value, a bigint, a throwing toString
const attempt = (render: () => string): string | undefined => {
  try {
    return render();
  } catch {
    return undefined;
  }
};

/**
 * Display form of a bound value, as embedded in `with argN <value>` labels.
 * @description Strings are shown verbatim; objects with their own
 * `toString` go through it; plain objects and arrays are shown as JSON.
 * Formatting never throws.
 *
 * @example
 * formatValue("abc");        // => "abc"
 * formatValue(null);         // => "null"
 * formatValue({ id: 1 });    // => '{"id":1}'
 * formatValue(new Date(0));  // => String(new Date(0))
 */
export const formatValue = (value: unknown): string => {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return value;
  if (typeof value === "symbol") return value.toString();
  if (typeof value === "function") return labelOf(value);
  if (typeof value === "object") {
    const ownToString: unknown = value.toString;
    const custom =
      !Array.isArray(value) &&
      typeof ownToString === "function" &&
      ownToString !== Object.prototype.toString
        ? attempt(() => String(value))
        : undefined;
    return custom ?? attempt(() => JSON.stringify(value)) ?? Object.prototype.toString.call(value);
  }
  return String(value);
};
