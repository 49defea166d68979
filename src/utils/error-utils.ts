/**
 * Utility functions for consistent error handling across the codebase.
 */

/**
 * Extracts a string message from any error value.
 * Handles Error instances, strings, numbers, null, undefined, and objects.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * AWS SDK v3 service exceptions carry the exception shape in `name`
 * (e.g. `ResourceNotFoundException`).
 */
export function hasErrorName(error: unknown, name: string): boolean {
  return error instanceof Error && error.name === name;
}
