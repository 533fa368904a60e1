import type { MiddlewareHandler } from 'hono';
import { ERROR_CODE_FORBIDDEN } from '@leadscout/shared';
import { createErrorResponse } from '../lib/error-response.js';
import { ERROR_CROSS_ORIGIN } from '../constants/errors.js';

interface CsrfEnv {
  Bindings: {
    FRONTEND_URL?: string;
  };
}

const STATE_CHANGING_METHODS = new Set(['POST', 'PUT', 'DELETE', 'PATCH']);

function rejected(c: Parameters<MiddlewareHandler<CsrfEnv>>[0]): Response {
  return c.json(createErrorResponse(ERROR_CROSS_ORIGIN, ERROR_CODE_FORBIDDEN), 403);
}

/**
 * Origin check for state-changing requests. A request without an Origin
 * header is same-origin; one with an Origin must match FRONTEND_URL.
 */
const csrfHandler: MiddlewareHandler<CsrfEnv> = async (c, next) => {
  if (!STATE_CHANGING_METHODS.has(c.req.method)) {
    return next();
  }

  const origin = c.req.header('Origin');
  if (!origin) {
    return next();
  }

  const frontendUrl = c.env?.FRONTEND_URL;
  if (!frontendUrl) {
    return rejected(c);
  }

  if (!URL.canParse(origin) || new URL(origin).origin !== new URL(frontendUrl).origin) {
    return rejected(c);
  }

  return next();
};

export function csrfProtection(): MiddlewareHandler<CsrfEnv> {
  return csrfHandler;
}
