/**
 * User-facing error messages. These are shown verbatim, so they never carry
 * internal state such as counters or client keys.
 */

// Authentication/Authorization errors
export const ERROR_NOT_AUTHENTICATED = 'Authentication required';
export const ERROR_INVALID_CREDENTIALS = 'Invalid email or password';
export const ERROR_EMAIL_NOT_VERIFIED = 'Please verify your email address before signing in';
export const ERROR_INCORRECT_PASSWORD = 'Current password is incorrect';
export const ERROR_INVALID_OR_EXPIRED_TOKEN = 'This link is invalid or has expired';

// Resource errors
export const ERROR_USER_NOT_FOUND = 'User not found';
export const ERROR_EMAIL_TAKEN = 'An account with this email already exists';

// Validation errors
export const ERROR_INVALID_REQUEST = 'Invalid request';

// Guest limit errors
export const ERROR_GUEST_SEARCH_LIMIT =
  'Daily free search limit reached. Sign up for unlimited searches.';
export const ERROR_GUEST_UNIDENTIFIED =
  'We could not verify your connection. Sign in to search.';
export const ERROR_SEARCH_UNAVAILABLE =
  'Search is temporarily unavailable. Please try again later.';

// Places errors
export const ERROR_LOCATION_NOT_FOUND = 'We could not find that location';
export const ERROR_PLACES_FAILED = 'The places service failed. Please try again later.';

// Internal errors
export const ERROR_INTERNAL = 'Internal server error';

// Request origin errors
export const ERROR_CROSS_ORIGIN = 'Cross-origin request rejected';
export const ERROR_ROUTE_NOT_FOUND = 'Not found';
