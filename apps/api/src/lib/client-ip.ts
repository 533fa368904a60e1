/**
 * Client identification for guest rate limiting.
 */

import { createHash } from 'crypto';

export interface RequestContext {
  req: {
    header: (name: string) => string | undefined;
  };
  env?:
    | {
        incoming?: { socket: { remoteAddress?: string | undefined } } | undefined;
      }
    | undefined;
}

/**
 * Get the best-available client IP.
 * Checks sources in order of preference:
 * 1. x-forwarded-for (first entry: the original client in a proxy chain)
 * 2. x-real-ip
 * 3. Socket remote address (Node server binding)
 *
 * Returns null when every source is empty. Callers must fail closed on null
 * rather than bucket unknown clients together.
 *
 * x-forwarded-for is trusted because the API is deployed behind a known
 * reverse proxy. Without one the header is client-controlled.
 */
export function getClientIp(c: RequestContext): string | null {
  const forwarded = c.req.header('x-forwarded-for');
  if (forwarded) {
    const firstIp = forwarded.split(',')[0]?.trim();
    if (firstIp) {
      return firstIp;
    }
  }

  const realIp = c.req.header('x-real-ip')?.trim();
  if (realIp) {
    return realIp;
  }

  // c.env is undefined when app.request() is called without bindings
  const remoteAddress = c.env?.incoming?.socket.remoteAddress;
  if (remoteAddress) {
    return remoteAddress;
  }

  return null;
}

/**
 * Hash a client identity for storage.
 * The user agent, when given, splits visitors sharing one IP (e.g. an office NAT).
 */
export function hashClientKey(ip: string, userAgent?: string | null): string {
  const material = userAgent ? `${ip}\n${userAgent}` : ip;
  return createHash('sha256').update(material).digest('hex');
}

export interface ResolveClientKeyOptions {
  includeUserAgent: boolean;
}

/**
 * Resolve the guest usage key for a request, or null if the client
 * cannot be identified.
 */
export function resolveClientKey(
  c: RequestContext,
  options: ResolveClientKeyOptions = { includeUserAgent: false }
): string | null {
  const ip = getClientIp(c);
  if (ip === null) {
    return null;
  }

  const userAgent = options.includeUserAgent ? c.req.header('user-agent') : undefined;
  return hashClientKey(ip, userAgent);
}
