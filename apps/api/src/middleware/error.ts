import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ERROR_CODE_INTERNAL } from '@leadscout/shared';
import { createErrorResponse } from '../lib/error-response.js';
import { ERROR_INTERNAL } from '../constants/errors.js';

/**
 * Global error handler. HTTPExceptions keep their own response; anything else
 * is logged with the route and answered with a generic 500.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error(`[api] Unhandled error on ${c.req.method} ${c.req.path}:`, err);
  return c.json(createErrorResponse(ERROR_INTERNAL, ERROR_CODE_INTERNAL), 500);
};
