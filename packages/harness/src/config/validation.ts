/**
 * Configuration validation - checks environment-provided settings on startup.
 * Fails fast with clear error messages rather than silent runtime failures.
 */

import { getErrorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { VectorRangeError, VectorShapeError } from "../vector/errors.js";
import { assignVectorField } from "../vector/fields.js";
import type { FieldValidator } from "../vector/range-validator.js";
import type { Vector2 } from "../vector/vector.js";
import {
  WINDOW_POSITION_ENV,
  WINDOW_SIZE_ENV,
  readWindowPosition,
  readWindowSize,
  windowSizeValidator,
} from "./browser.js";
import type { EnvSource } from "./helpers.js";
import { LOGIN_PASSWORD_ENV, LOGIN_USER_ENV, readLoginPassword, readLoginUser } from "./login.js";

const log = createLogger("CONFIG");

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Run a vector setting through its validators.
 * @returns Error if validation fails, undefined if success
 */
function checkVector(
  field: string,
  vector: Vector2,
  validators: readonly FieldValidator[]
): ConfigError | undefined {
  try {
    assignVectorField(null, field, vector, validators);
    return undefined;
  } catch (error) {
    if (error instanceof VectorShapeError || error instanceof VectorRangeError) {
      return { field, message: getErrorMessage(error) };
    }
    throw error;
  }
}

/**
 * Validate configuration read from the environment.
 * @returns Array of configuration errors (empty if valid)
 */
export function validateConfig(env: EnvSource = process.env): ConfigError[] {
  const errors: ConfigError[] = [];

  const sizeError = checkVector(WINDOW_SIZE_ENV, readWindowSize(env), [windowSizeValidator]);
  if (sizeError) errors.push(sizeError);

  const positionError = checkVector(WINDOW_POSITION_ENV, readWindowPosition(env), []);
  if (positionError) errors.push(positionError);

  // A password without a user can never be used
  if (readLoginUser(env) === null && readLoginPassword(env) !== null) {
    errors.push({
      field: LOGIN_USER_ENV,
      message: `${LOGIN_PASSWORD_ENV} is set but ${LOGIN_USER_ENV} is not`,
    });
  }

  return errors;
}

/**
 * Validate configuration or throw with detailed error message.
 * Call this early in test setup to fail fast.
 */
export function validateConfigOrThrow(env: EnvSource = process.env): void {
  const errors = validateConfig(env);
  if (errors.length > 0) {
    const messages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Configuration validation failed:\n${messages}`);
  }
}

/**
 * Log configuration summary for debugging.
 * The password itself is never printed.
 */
export function logConfigSummary(env: EnvSource = process.env): void {
  log.info("Browser settings:");
  log.info(`  - ${WINDOW_SIZE_ENV}: ${readWindowSize(env).toString()}`);
  log.info(`  - ${WINDOW_POSITION_ENV}: ${readWindowPosition(env).toString()}`);
  log.info(`  - ${LOGIN_USER_ENV}: ${readLoginUser(env) ?? "(unset)"}`);
  log.info(`  - ${LOGIN_PASSWORD_ENV}: ${readLoginPassword(env) === null ? "(unset)" : "(set)"}`);
}
