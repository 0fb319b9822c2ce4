/**
 * Centralized configuration for browser test setups.
 * All environment variable names and readers are defined here.
 *
 * This module re-exports from domain-specific config files:
 * - helpers.ts: Shared env helpers
 * - browser.ts: Window size and position
 * - login.ts: Default login credentials
 * - validation.ts: Startup validation
 */

// Helpers
export { toStringOrNull, type EnvSource } from "./helpers.js";

// Browser window
export {
  WINDOW_SIZE_ENV,
  WINDOW_POSITION_ENV,
  windowSizeValidator,
  readWindowSize,
  readWindowPosition,
} from "./browser.js";

// Login
export { LOGIN_USER_ENV, LOGIN_PASSWORD_ENV, readLoginUser, readLoginPassword } from "./login.js";

// Validation
export {
  validateConfig,
  validateConfigOrThrow,
  logConfigSummary,
  type ConfigError,
} from "./validation.js";
