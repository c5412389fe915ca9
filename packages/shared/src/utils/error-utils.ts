// =====================================================
// ERROR UTILITIES
// Common error handling utilities for consistent error messaging
// =====================================================

/**
 * Extract error message from any error type
 * Handles Error instances, strings, and unknown types
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow an unknown thrown value to an Error, wrapping anything else
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
