/**
 * Vector2: an immutable pair of optional integers.
 *
 * Used for window sizes and window positions, where either component may be
 * left unset (null) and filled in by the browser.
 */

import { inspect } from "node:util";
import { isInteger, isIterable } from "../utils/type-guards.js";
import { logSilentError } from "../utils/logger.js";

/** An integer, or null when the component is absent */
export type VectorComponent = number | null;

export class Vector2 implements Iterable<VectorComponent> {
  readonly x: VectorComponent;
  readonly y: VectorComponent;

  constructor(x: VectorComponent = null, y: VectorComponent = null) {
    this.x = x;
    this.y = y;
    Object.freeze(this);
  }

  /** Value equality: same x and same y */
  equals(other: unknown): boolean {
    return other instanceof Vector2 && other.x === this.x && other.y === this.y;
  }

  toArray(): [VectorComponent, VectorComponent] {
    return [this.x, this.y];
  }

  *[Symbol.iterator](): Iterator<VectorComponent> {
    yield this.x;
    yield this.y;
  }

  toString(): string {
    return `Vector2(${this.x}, ${this.y})`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Result of a permissive conversion. On failure the original input is kept
 * untouched so the caller can report it.
 */
export type VectorConversion<T> =
  | { ok: true; vector: Vector2 }
  | { ok: false; value: T };

export function isVector2(value: unknown): value is Vector2 {
  return value instanceof Vector2;
}

const SIGNED_INTEGER = /^\s*[+-]?\d+\s*$/;

/**
 * Coerce a single element of an iterable to a vector component.
 * Returns undefined when the element can't be read as an integer.
 */
function coerceComponent(value: unknown): VectorComponent | undefined {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return safeInteger(Math.trunc(value));
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string" && SIGNED_INTEGER.test(value)) {
    return safeInteger(Number.parseInt(value.trim(), 10));
  }
  return undefined;
}

/** Components past 2^53 can't be told apart, so they don't count as integers */
function safeInteger(value: number): number | undefined {
  return Number.isSafeInteger(value) ? value : undefined;
}

function coerceVector(value: unknown): Vector2 | undefined {
  if (value instanceof Vector2) {
    return value;
  }
  // A single value (or nothing) is broadcast to both components
  if (value === null || value === undefined) {
    return new Vector2(null, null);
  }
  if (isInteger(value) && Number.isSafeInteger(value)) {
    return new Vector2(value, value);
  }
  if (typeof value === "boolean") {
    const component = value ? 1 : 0;
    return new Vector2(component, component);
  }
  if (!isIterable(value)) {
    return undefined;
  }

  try {
    const iterator = value[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) return undefined;
    const second = iterator.next();
    if (second.done) return undefined;

    const x = coerceComponent(first.value);
    const y = coerceComponent(second.value);
    if (x === undefined || y === undefined) {
      return undefined;
    }
    return new Vector2(x, y);
  } catch (error) {
    logSilentError("Vector2 conversion", error);
    return undefined;
  }
}

/**
 * Try to turn any value into a Vector2.
 *
 * - A Vector2 is returned as the very same instance.
 * - null, undefined, an integer or a boolean is broadcast: `7` becomes
 *   `(7, 7)`, `true` becomes `(1, 1)`.
 * - Any other iterable contributes its first two elements, each coerced to
 *   an integer unless it is null/undefined.
 *
 * Never throws. Anything that doesn't fit comes back as `{ ok: false, value }`.
 */
export function convertToVector<T>(value: T): VectorConversion<T> {
  const vector = coerceVector(value);
  return vector ? { ok: true, vector } : { ok: false, value };
}

/**
 * Converter form of {@link convertToVector}: the vector, or the input as is.
 * Pair it with an explicit `isVector2` check.
 */
export function toVectorOrValue<T>(value: T): Vector2 | T {
  const result = convertToVector(value);
  return result.ok ? result.vector : result.value;
}
