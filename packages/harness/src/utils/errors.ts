/**
 * Standardized error message extraction.
 */

/**
 * Extract a human-readable error message from an unknown error.
 * Handles Error objects, strings, and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

