import type { MiddlewareHandler } from 'hono';

const CONTENT_SECURITY_POLICY = ["default-src 'none'", "frame-ancestors 'none'"].join('; ');

/**
 * Security headers for API responses. Only JSON and CSV are served, so the
 * policy allows nothing to load. Responses carry lead data or session state
 * and are never cached.
 */
export function securityHeaders(): MiddlewareHandler {
  return async (c, next) => {
    await next();

    c.header('Content-Security-Policy', CONTENT_SECURITY_POLICY);
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
    c.header('Cross-Origin-Resource-Policy', 'same-site');
    c.header('Cache-Control', 'no-store');
  };
}
