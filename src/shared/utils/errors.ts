/**
 * Error normalization helpers
 *
 * @module shared/utils/errors
 */

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Check whether a thrown value carries the given errno code (e.g. 'ENOENT')
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isNodeError(error) && error.code === code;
}

/**
 * Extract a loggable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
