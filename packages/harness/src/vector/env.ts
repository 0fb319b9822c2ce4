/**
 * Environment value to Vector2.
 *
 * Strings go through the tolerant parser; anything else (values set from
 * code rather than from the environment) goes through the converter.
 */

import { formatValue } from "../utils/format.js";
import { VectorTypeError } from "./errors.js";
import { parseVectorString } from "./string-parser.js";
import { Vector2, convertToVector } from "./vector.js";

/**
 * Returns null when no value is given, or when a string holds no usable
 * integers. A string parsed to (null, null) counts as "not specified";
 * a non-string (null, null) value is kept as an explicitly unset vector.
 *
 * @throws VectorTypeError if a non-string value can't be converted
 */
export function envToVectorOrNull(value: unknown): Vector2 | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "string") {
    const pair = parseVectorString(value);
    if (!pair) {
      return null;
    }
    const [x, y] = pair;
    if (x === null && y === null) {
      return null;
    }
    return new Vector2(x, y);
  }

  const result = convertToVector(value);
  if (!result.ok) {
    throw new VectorTypeError(
      `Environment variable (string) is expected (or null/Vector2/iterable of integers). Got: ${formatValue(value)}`,
      value
    );
  }
  return result.vector;
}

/** Same as {@link envToVectorOrNull}, with `Vector2(null, null)` in place of null */
export function envToVector(value: unknown): Vector2 {
  return envToVectorOrNull(value) ?? new Vector2();
}
