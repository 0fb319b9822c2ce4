/**
 * Errors raised while converting or validating vectors.
 *
 * Parse misses and conversion misses are not errors: they come back as
 * `null` or as a failed `VectorConversion`. Everything here is thrown.
 */

import type { VectorComponent } from "./vector.js";

/** A candidate has the wrong arity, or holds a null where nulls are forbidden */
export class VectorShapeError extends TypeError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = "VectorShapeError";
  }
}

/** A present component is below its configured minimum */
export class VectorRangeError extends RangeError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = "VectorRangeError";
  }
}

/** A validator was declared with a constraint that can never fail */
export class ValidatorConfigError extends Error {
  constructor(
    message: string,
    public readonly minX: VectorComponent,
    public readonly minY: VectorComponent,
    public readonly allowAbsent: boolean
  ) {
    super(message);
    this.name = "ValidatorConfigError";
  }
}

/** A non-string environment value could not be turned into a vector */
export class VectorTypeError extends TypeError {
  constructor(message: string, public readonly value: unknown) {
    super(message);
    this.name = "VectorTypeError";
  }
}
