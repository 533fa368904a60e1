import type { MiddlewareHandler } from 'hono';
import { ERROR_CODE_NOT_AUTHENTICATED } from '@leadscout/shared';
import type { AppEnv } from '../types.js';
import { createErrorResponse } from '../lib/error-response.js';
import { ERROR_NOT_AUTHENTICATED } from '../constants/errors.js';

/**
 * Middleware that requires authentication.
 * Returns 401 if no user is set on context.
 */
export function requireAuth(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!c.get('user')) {
      return c.json(createErrorResponse(ERROR_NOT_AUTHENTICATED, ERROR_CODE_NOT_AUTHENTICATED), 401);
    }
    return next();
  };
}
