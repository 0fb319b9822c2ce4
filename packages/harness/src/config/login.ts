/**
 * Credentials used by Loginer when none are passed explicitly.
 */

import { toStringOrNull, type EnvSource } from "./helpers.js";

export const LOGIN_USER_ENV = "LOGIN_USER";
export const LOGIN_PASSWORD_ENV = "LOGIN_PASSWORD";

/** Login name, unstripped; null when unset */
export function readLoginUser(env: EnvSource = process.env): string | null {
  return toStringOrNull(env[LOGIN_USER_ENV], { strip: false });
}

/** Login password, unstripped; null when unset */
export function readLoginPassword(env: EnvSource = process.env): string | null {
  return toStringOrNull(env[LOGIN_PASSWORD_ENV], { strip: false });
}
