/**
 * Error helpers shared by every module
 */

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalise an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
