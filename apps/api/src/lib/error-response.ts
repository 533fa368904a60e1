/**
 * Error response utilities for consistent API error handling.
 *
 * All error responses use `{ error, code?, details? }` format.
 */

import type { ErrorResponse } from '@leadscout/shared';

/**
 * Creates a standardized error response object.
 *
 * @param error - Human-readable message, safe to show end users
 * @param code - Machine-readable error code
 * @param details - Optional additional context
 */
export function createErrorResponse(
  error: string,
  code?: string,
  details?: Record<string, unknown>
): ErrorResponse {
  const response: ErrorResponse = { error };
  if (code !== undefined) {
    response.code = code;
  }
  if (details !== undefined) {
    response.details = details;
  }
  return response;
}
