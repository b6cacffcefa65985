/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks where the thrown value is unknown.
 */

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Type guard to check if error has a code property
 */
export function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Safely extract error code from unknown error
 * Common for file system and network errors
 */
export function getErrorCode(error: unknown): string | undefined {
  if (hasCode(error)) {
    return error.code;
  }

  return undefined;
}

/**
 * Convert unknown error to Error object
 */
export function toError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  return new Error(getErrorMessage(error));
}

/**
 * Abort errors come from AbortController (DOMException 'AbortError'),
 * axios (CanceledError, code ERR_CANCELED) and timers/promises (code ABORT_ERR)
 */
export function isAbortError(error: unknown): boolean {
  if (isError(error) && (error.name === 'AbortError' || error.name === 'CanceledError')) {
    return true;
  }
  const code = getErrorCode(error);
  return code === 'ABORT_ERR' || code === 'ERR_CANCELED';
}
