import { z } from 'zod';

// ============================================================
// Error Codes
// ============================================================

/** Authentication required or session invalid */
export const ERROR_CODE_NOT_AUTHENTICATED = 'NOT_AUTHENTICATED';

/** Resource not found */
export const ERROR_CODE_NOT_FOUND = 'NOT_FOUND';

/** Validation error - invalid input */
export const ERROR_CODE_VALIDATION = 'VALIDATION';

/** Rate limit exceeded */
export const ERROR_CODE_RATE_LIMITED = 'RATE_LIMITED';

/** Internal server error */
export const ERROR_CODE_INTERNAL = 'INTERNAL';

/** Forbidden - request cannot be attributed or is not allowed */
export const ERROR_CODE_FORBIDDEN = 'FORBIDDEN';

/** Conflict - resource already exists */
export const ERROR_CODE_CONFLICT = 'CONFLICT';

/** A backing service is temporarily unavailable */
export const ERROR_CODE_SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE';

/** A third-party API failed */
export const ERROR_CODE_UPSTREAM = 'UPSTREAM';

/** Geocoding found no location for the given city */
export const ERROR_CODE_LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND';

export const ERROR_CODE_AUTH_FAILED = 'AUTH_FAILED';

export const ERROR_CODE_EMAIL_NOT_VERIFIED = 'EMAIL_NOT_VERIFIED';

export const ERROR_CODE_INVALID_OR_EXPIRED_TOKEN = 'INVALID_OR_EXPIRED_TOKEN';

export const ERROR_CODE_INCORRECT_PASSWORD = 'INCORRECT_PASSWORD';

// ============================================================
// Error Response Schema
// ============================================================

/**
 * Standard error response schema.
 *
 * All API error responses follow this format:
 * - `error`: Human-readable error message (required)
 * - `code`: Machine-readable error code for programmatic handling (optional)
 * - `details`: Additional context about the error (optional)
 */
export const errorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  details: z.record(z.string(), z.unknown()).optional(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
