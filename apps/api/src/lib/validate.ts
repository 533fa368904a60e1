import { zValidator } from '@hono/zod-validator';
import type { ZodSchema } from 'zod';
import { ERROR_CODE_VALIDATION } from '@leadscout/shared';
import { createErrorResponse } from './error-response.js';
import { ERROR_INVALID_REQUEST } from '../constants/errors.js';

/**
 * JSON body validator that answers failures in the standard error format.
 */
export function validateJson<T extends ZodSchema>(schema: T) {
  return zValidator('json', schema, (result, c) => {
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return c.json(createErrorResponse(ERROR_INVALID_REQUEST, ERROR_CODE_VALIDATION, { issues }), 400);
    }
    return undefined;
  });
}
