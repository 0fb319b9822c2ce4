/**
 * Browser settings with Vector2 fields.
 *
 * Every assignment runs the field pipeline (convert, type check, validators),
 * so a settings object never holds a value its validators would reject.
 */

import { readWindowPosition, readWindowSize, windowSizeValidator } from "./config/browser.js";
import type { EnvSource } from "./config/helpers.js";
import { assignVectorField } from "./vector/fields.js";
import type { FieldValidator } from "./vector/range-validator.js";
import type { Vector2 } from "./vector/vector.js";

export interface BrowserSettingsInit {
  /** Anything convertible to a Vector2; read from the environment when omitted */
  windowSize?: unknown;
  windowPosition?: unknown;
}

const WINDOW_SIZE_VALIDATORS: readonly FieldValidator[] = [windowSizeValidator];
const WINDOW_POSITION_VALIDATORS: readonly FieldValidator[] = [];

export class BrowserSettings {
  private _windowSize: Vector2;
  private _windowPosition: Vector2;

  constructor(init: BrowserSettingsInit = {}, env: EnvSource = process.env) {
    this._windowSize = assignVectorField(
      this,
      "windowSize",
      init.windowSize === undefined ? readWindowSize(env) : init.windowSize,
      WINDOW_SIZE_VALIDATORS
    );
    this._windowPosition = assignVectorField(
      this,
      "windowPosition",
      init.windowPosition === undefined ? readWindowPosition(env) : init.windowPosition,
      WINDOW_POSITION_VALIDATORS
    );
  }

  get windowSize(): Vector2 {
    return this._windowSize;
  }

  /** Accepts a Vector2, an integer, null, or an [x, y] iterable */
  set windowSize(value: unknown) {
    this._windowSize = assignVectorField(this, "windowSize", value, WINDOW_SIZE_VALIDATORS);
  }

  get windowPosition(): Vector2 {
    return this._windowPosition;
  }

  set windowPosition(value: unknown) {
    this._windowPosition = assignVectorField(this, "windowPosition", value, WINDOW_POSITION_VALIDATORS);
  }
}
