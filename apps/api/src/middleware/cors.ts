import { cors as honoCors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';
import { DEFAULT_FRONTEND_URL } from '../lib/frontend-url.js';

interface CorsBindings {
  FRONTEND_URL?: string;
}

const DEFAULT_ORIGIN = DEFAULT_FRONTEND_URL;

/**
 * Allows credentialed requests from the frontend. Content-Disposition is
 * exposed so the browser can read export file names.
 */
export function cors(): MiddlewareHandler<{ Bindings: CorsBindings }> {
  return async (c, next) => {
    // c.env may be undefined in tests
    const frontendUrl = c.env?.FRONTEND_URL ?? DEFAULT_ORIGIN;
    const origins =
      frontendUrl === DEFAULT_ORIGIN ? [DEFAULT_ORIGIN] : [frontendUrl, DEFAULT_ORIGIN];

    const corsMiddleware = honoCors({
      origin: origins,
      credentials: true,
      exposeHeaders: ['Content-Disposition'],
    });

    return corsMiddleware(c, next);
  };
}
