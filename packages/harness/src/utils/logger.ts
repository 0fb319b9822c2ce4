/**
 * Prefixed console logger.
 * Provides info, warn, error, and debug levels; debug is silent unless
 * DEBUG or HARNESS_DEBUG is set.
 */

import { getErrorMessage } from "./errors.js";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: unknown) => void;
  debug: (msg: string) => void;
}

export function isDebugEnabled(): boolean {
  return Boolean(process.env.DEBUG || process.env.HARNESS_DEBUG);
}

/**
 * Create a logger with a consistent prefix.
 * @param prefix - The prefix to prepend to all log messages (e.g., "CONFIG", "LOADER")
 */
export const createLogger = (prefix: string): Logger => {
  const tag = `[${prefix}]`;
  return {
    info: (msg) => console.log(`${tag} ${msg}`),
    warn: (msg) => console.warn(`${tag} ${msg}`),
    error: (msg, err) => {
      console.error(err === undefined ? `${tag} ${msg}` : `${tag} ${msg}: ${getErrorMessage(err)}`);
    },
    debug: (msg) => {
      if (isDebugEnabled()) {
        console.log(`[${prefix}:DEBUG] ${msg}`);
      }
    },
  };
};

const silent = createLogger("SILENT");

/**
 * Report an error that was caught on purpose and turned into a "no result".
 * Only visible with debug output on.
 * @param context - Description of what operation failed
 */
export const logSilentError = (context: string, error: unknown): void => {
  silent.debug(`${context}: ${getErrorMessage(error)}`);
};
