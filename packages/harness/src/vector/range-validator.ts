/**
 * Minimum-bound validators for Vector2 fields.
 *
 * A validator checks that each constrained component is >= its minimum, or
 * is null when nulls are allowed. Which components are constrained is
 * decided once, at construction, as a BoundPlan; every call after that only
 * dispatches on the plan.
 */

import { describeType, formatValue } from "../utils/format.js";
import { isInteger, isIterable } from "../utils/type-guards.js";
import { logSilentError } from "../utils/logger.js";
import { ValidatorConfigError, VectorRangeError, VectorShapeError } from "./errors.js";
import type { VectorPair } from "./string-parser.js";
import type { VectorComponent } from "./vector.js";

/**
 * Validator signature shared by every field check: the object being
 * configured, the field name and the candidate value. Throws on failure.
 */
export type FieldValidator = (context: unknown, field: string, value: unknown) => void;

export type BoundPlan =
  | { kind: "no-bound" }
  | { kind: "x-only"; minX: number }
  | { kind: "y-only"; minY: number }
  | { kind: "both"; minX: number; minY: number };

export interface RangeValidatorOptions {
  minX?: number | null;
  minY?: number | null;
  /** Whether null components pass (default true) */
  allowAbsent?: boolean;
}

/** Pick the plan from which minimums are set */
export function planBounds(minX: VectorComponent, minY: VectorComponent): BoundPlan {
  if (minX !== null && minY !== null) {
    return { kind: "both", minX, minY };
  }
  if (minX !== null) {
    return { kind: "x-only", minX };
  }
  if (minY !== null) {
    return { kind: "y-only", minY };
  }
  return { kind: "no-bound" };
}

/** Human-readable description of what a valid value looks like */
export function describeExpectation(plan: BoundPlan, allowAbsent: boolean): string {
  const orNull = allowAbsent ? " or being null" : "";
  switch (plan.kind) {
    case "no-bound":
      return "neither X nor Y being null";
    case "both": {
      const bounds = `(X >= ${plan.minX}, Y >= ${plan.minY})`;
      return allowAbsent ? `${bounds} or either being null` : `${bounds} and neither being null`;
    }
    case "x-only":
      return `X >= ${plan.minX}${orNull}`;
    case "y-only":
      return `Y >= ${plan.minY}${orNull}`;
  }
}

function atLeast(component: VectorComponent, min: number): boolean {
  return component === null || component >= min;
}

/** Bound check on an already shape-checked pair */
export function withinBounds(plan: BoundPlan, [x, y]: VectorPair): boolean {
  switch (plan.kind) {
    case "no-bound":
      return true;
    case "x-only":
      return atLeast(x, plan.minX);
    case "y-only":
      return atLeast(y, plan.minY);
    case "both":
      return atLeast(x, plan.minX) && atLeast(y, plan.minY);
  }
}

function readComponent(value: unknown, allowAbsent: boolean): VectorComponent | undefined {
  if (isInteger(value)) {
    return value;
  }
  if (allowAbsent && (value === null || value === undefined)) {
    return null;
  }
  return undefined;
}

/** Exactly two elements, each an integer (or null when allowed) */
function readPair(value: unknown, allowAbsent: boolean): VectorPair | undefined {
  if (!isIterable(value)) {
    return undefined;
  }
  const items: unknown[] = [];
  try {
    for (const item of value) {
      items.push(item);
      if (items.length > 2) return undefined;
    }
  } catch (error) {
    logSilentError("Vector shape check", error);
    return undefined;
  }
  if (items.length !== 2) {
    return undefined;
  }

  const x = readComponent(items[0], allowAbsent);
  const y = readComponent(items[1], allowAbsent);
  if (x === undefined || y === undefined) {
    return undefined;
  }
  return [x, y];
}

/**
 * Shape check: the value must iterate into exactly two components.
 * @throws VectorShapeError
 */
export function checkShape(field: string, value: unknown, allowAbsent: boolean): VectorPair {
  const pair = readPair(value, allowAbsent);
  if (!pair) {
    const components = allowAbsent ? "integers or null" : "integers (not null)";
    throw new VectorShapeError(
      `'${field}' must be an iterable of 2 ${components}, preferably a Vector2. ` +
        `Got: ${formatValue(value)} (type: ${describeType(value)})`,
      field,
      value
    );
  }
  return pair;
}

/**
 * Validator requiring either or both Vector2 components to be at least a
 * given minimum, or null.
 *
 * @example
 * const atLeastOnePixel = new VectorRangeValidator({ minX: 1, minY: 1 });
 * atLeastOnePixel.validate(settings, "windowSize", new Vector2(1280, null));
 */
export class VectorRangeValidator {
  readonly minX: VectorComponent;
  readonly minY: VectorComponent;
  readonly allowAbsent: boolean;
  readonly plan: BoundPlan;
  readonly expectation: string;

  /** The check itself, usable detached from the instance */
  readonly validate: FieldValidator;

  constructor(options: RangeValidatorOptions = {}) {
    this.minX = options.minX ?? null;
    this.minY = options.minY ?? null;
    this.allowAbsent = options.allowAbsent ?? true;

    for (const [name, min] of [["minX", this.minX], ["minY", this.minY]] as const) {
      if (min !== null && !isInteger(min)) {
        throw new ValidatorConfigError(
          `VectorRangeValidator: ${name} must be an integer or null. Got: ${min}`,
          this.minX,
          this.minY,
          this.allowAbsent
        );
      }
    }
    this.plan = planBounds(this.minX, this.minY);

    if (this.plan.kind === "no-bound" && this.allowAbsent) {
      throw new ValidatorConfigError(
        "VectorRangeValidator needs at least one of the components to have a minimum value specified, " +
          `or null being forbidden. Got: (minX=${this.minX}, minY=${this.minY}, allowAbsent=${this.allowAbsent})`,
        this.minX,
        this.minY,
        this.allowAbsent
      );
    }
    this.expectation = describeExpectation(this.plan, this.allowAbsent);

    const { plan, allowAbsent, expectation } = this;
    this.validate = (_context, field, value) => {
      const pair = checkShape(field, value, allowAbsent);
      if (!withinBounds(plan, pair)) {
        throw new VectorRangeError(
          `'${field}' must be a Vector2 with ${expectation}. Got: ${formatValue(value)}`,
          field,
          value
        );
      }
    };
    Object.freeze(this);
  }

  toString(): string {
    const nulls = this.allowAbsent ? "or null" : "and not null";
    return `<VectorRangeValidator at least (${this.minX}, ${this.minY}) ${nulls}>`;
  }
}

/** Factory form: build a validator and hand back its check */
export function vectorRangeValidator(
  minX: number | null = null,
  minY: number | null = null,
  allowAbsent = true
): FieldValidator {
  return new VectorRangeValidator({ minX, minY, allowAbsent }).validate;
}
