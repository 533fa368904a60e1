/**
 * Authentication-related constants.
 */

/** Email verification token lifetime: 24 hours */
export const EMAIL_VERIFY_TOKEN_EXPIRY_MS = 24 * 60 * 60 * 1000;

/** Password reset token lifetime: 1 hour */
export const PASSWORD_RESET_TOKEN_EXPIRY_MS = 60 * 60 * 1000;
