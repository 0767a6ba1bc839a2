import type { Constructor } from "./types.js";

const CLASS_SOURCE = /^class[\s{]/;

/**
 * Check whether a value is a class declared with the `class` keyword.
 *
 * Plain functions, arrow functions and bound functions are rejected, so
 * exported helpers are not mistaken for type definitions.
 */
export function isClass(value: unknown): value is Constructor {
  if (typeof value !== "function") return false;
  return CLASS_SOURCE.test(Function.prototype.toString.call(value));
}

/**
 * Check whether a value is a non-null object (arrays included).
 */
export function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Check whether a value is a plain record (not an array, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return isObject(value) && !Array.isArray(value);
}

/**
 * True when `cls` is `base` or extends it anywhere up its constructor chain.
 * Non-functions are never subclasses.
 */
export function isSubclassOf(cls: unknown, base: Constructor): boolean {
  let current: unknown = cls;
  while (typeof current === "function") {
    if (current === base) return true;
    current = Object.getPrototypeOf(current);
  }
  return false;
}
