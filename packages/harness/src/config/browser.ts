/**
 * Browser window configuration.
 */

import { createLogger } from "../utils/logger.js";
import { envToVector } from "../vector/env.js";
import { vectorRangeValidator } from "../vector/range-validator.js";
import type { Vector2 } from "../vector/vector.js";
import type { EnvSource } from "./helpers.js";

const log = createLogger("CONFIG");

/** Window size, e.g. "1280x720", "1280 720" or just "1024" for a square */
export const WINDOW_SIZE_ENV = "BROWSER_WINDOW_SIZE";

/** Window position of the top-left corner, same formats as the size */
export const WINDOW_POSITION_ENV = "BROWSER_WINDOW_POSITION";

/** A window needs at least one pixel on each side it sets */
export const windowSizeValidator = vectorRangeValidator(1, 1, true);

function readVector(env: EnvSource, name: string): Vector2 {
  const raw = env[name];
  const vector = envToVector(raw);
  if (raw && vector.x === null && vector.y === null) {
    log.debug(`${name}=${JSON.stringify(raw)} holds no usable integers, leaving it unset`);
  }
  return vector;
}

/** Window size from the environment; (null, null) when unset */
export function readWindowSize(env: EnvSource = process.env): Vector2 {
  return readVector(env, WINDOW_SIZE_ENV);
}

/** Window position from the environment; (null, null) when unset */
export function readWindowPosition(env: EnvSource = process.env): Vector2 {
  return readVector(env, WINDOW_POSITION_ENV);
}
