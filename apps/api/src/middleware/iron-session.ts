import type { MiddlewareHandler } from 'hono';
import { getIronSession } from 'iron-session';
import { createEnvUtilities } from '@leadscout/shared';
import { getSessionOptions, isValidSession, type SessionData } from '../lib/session.js';

interface IronSessionRequiredEnv {
  Bindings: {
    IRON_SESSION_SECRET?: string;
    NODE_ENV?: string;
  };
  Variables: {
    sessionData: SessionData | null;
  };
}

/**
 * Reads the encrypted session cookie and sets `sessionData`, or null when
 * there is no valid session or no secret is configured.
 */
const ironSessionHandler: MiddlewareHandler<IronSessionRequiredEnv> = async (c, next) => {
  // c.env is undefined when app.request() is called without bindings
  const secret = c.env?.IRON_SESSION_SECRET;

  if (!secret) {
    c.set('sessionData', null);
    return next();
  }

  const { isProduction } = createEnvUtilities(c.env);
  const session = await getIronSession<SessionData>(
    c.req.raw,
    c.res,
    getSessionOptions(secret, isProduction)
  );

  c.set('sessionData', isValidSession(session) ? session : null);
  return next();
};

export function createIronSessionMiddleware(): MiddlewareHandler<IronSessionRequiredEnv> {
  return ironSessionHandler;
}
