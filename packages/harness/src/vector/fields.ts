/**
 * Converter + validator pipeline for Vector2-typed settings fields.
 */

import { describeType, formatValue } from "../utils/format.js";
import { VectorShapeError } from "./errors.js";
import type { FieldValidator } from "./range-validator.js";
import { Vector2, isVector2, toVectorOrValue } from "./vector.js";

/**
 * Run one assignment through the field pipeline: convert, require a
 * Vector2, then every validator in order.
 *
 * @param context - The object owning the field, passed on to validators
 * @param field - Field name used in error messages
 * @param raw - The value being assigned
 * @throws VectorShapeError if the value doesn't convert to a Vector2
 */
export function assignVectorField(
  context: unknown,
  field: string,
  raw: unknown,
  validators: readonly FieldValidator[] = []
): Vector2 {
  const value = toVectorOrValue(raw);
  if (!isVector2(value)) {
    throw new VectorShapeError(
      `'${field}' must be a Vector2 or convertible to one. Got: ${formatValue(raw)} (type: ${describeType(raw)})`,
      field,
      raw
    );
  }
  for (const validate of validators) {
    validate(context, field, value);
  }
  return value;
}
