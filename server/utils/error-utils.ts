/**
 * Error utility functions for type-safe error handling
 */

/**
 * Safely extract error message from an unknown error type
 * Use this in catch blocks instead of `catch (error: any)`
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (
    error !== null &&
    typeof error === 'object' &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

/**
 * Check if error is an HTTP-like error with a numeric status
 * Express and body-parser errors carry either `status` or `statusCode`
 */
export function isHttpError(
  error: unknown
): error is { status: number; message?: string } {
  return (
    error !== null &&
    typeof error === 'object' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

/**
 * Get error status code if available
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (isHttpError(error)) {
    return error.status;
  }
  if (
    error !== null &&
    typeof error === 'object' &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}
