export { Vector2, convertToVector, toVectorOrValue, isVector2 } from "./vector.js";
export type { VectorComponent, VectorConversion } from "./vector.js";
export {
  parseVectorString,
  parseSpaceDelimited,
  parseSingleSeparator,
  scanDigitRuns,
  firstMatch,
} from "./string-parser.js";
export type { VectorPair, PairParser } from "./string-parser.js";
export { envToVector, envToVectorOrNull } from "./env.js";
export {
  VectorRangeValidator,
  vectorRangeValidator,
  planBounds,
  describeExpectation,
  withinBounds,
  checkShape,
} from "./range-validator.js";
export type { BoundPlan, FieldValidator, RangeValidatorOptions } from "./range-validator.js";
export { assignVectorField } from "./fields.js";
export { VectorShapeError, VectorRangeError, ValidatorConfigError, VectorTypeError } from "./errors.js";
