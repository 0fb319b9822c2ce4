/**
 * Value formatting for error messages.
 */

import { inspect } from "node:util";

/** Render any value the way it would show up in a REPL */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity });
}

/** Short runtime type label: "null", "string", "Array", "Vector2", ... */
export function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "Object";
  }
  return typeof value;
}
