/**
 * Type guards for safer type narrowing.
 *
 * These replace type assertions (as X) with runtime checks on values
 * coming from the environment or from untyped callers.
 */

/**
 * Check if a value is a plain object (Record<string, unknown>)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a safe-to-use integer number
 */
export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * Check if a value can be walked with for...of.
 * Strings count: they iterate by character.
 */
export function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") {
    return true;
  }
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}
