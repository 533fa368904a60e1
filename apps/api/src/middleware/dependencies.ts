import type { MiddlewareHandler } from 'hono';
import { eq } from 'drizzle-orm';
import { createDb, LOCAL_NEON_DEV_CONFIG, users, type Database } from '@leadscout/db';
import { createEnvUtilities } from '@leadscout/shared';
import { selectEmailClient, type EmailClient } from '../services/email/index.js';
import { getPlacesClient, type PlacesClient } from '../services/places/index.js';
import type { AppEnv } from '../types.js';
import { createIronSessionMiddleware } from './iron-session.js';

const databases = new Map<string, Database>();

function getDatabase(connectionString: string, isDev: boolean): Database {
  const existing = databases.get(connectionString);
  if (existing) {
    return existing;
  }
  const db = createDb(
    isDev ? { connectionString, neonDev: LOCAL_NEON_DEV_CONFIG } : { connectionString }
  );
  databases.set(connectionString, db);
  return db;
}

/**
 * Sets `db`. Uses the given database, or a pooled client for DATABASE_URL
 * shared by every request.
 */
export function dbMiddleware(db?: Database): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (db) {
      c.set('db', db);
      return next();
    }

    const connectionString = c.env?.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL is required');
    }
    c.set('db', getDatabase(connectionString, c.get('envUtils').isDev));
    await next();
  };
}

export function placesMiddleware(places?: PlacesClient): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set('places', places ?? getPlacesClient(c.env ?? {}));
    await next();
  };
}

export function emailMiddleware(email?: EmailClient): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set('email', email ?? selectEmailClient(c.env ?? {}));
    await next();
  };
}

export function envMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    // c.env may be undefined in tests when app.request() is called without bindings
    c.set('envUtils', createEnvUtilities(c.env ?? {}));
    await next();
  };
}

export function ironSessionMiddleware(): MiddlewareHandler {
  return createIronSessionMiddleware();
}

/**
 * Sets `user` from the session, or null for guests. A session whose user no
 * longer exists is treated as a guest.
 */
export function userMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const sessionData = c.get('sessionData');
    if (!sessionData) {
      c.set('user', null);
      return next();
    }

    const [user] = await c
      .get('db')
      .select({
        id: users.id,
        email: users.email,
        name: users.name,
        emailVerified: users.emailVerified,
        createdAt: users.createdAt,
      })
      .from(users)
      .where(eq(users.id, sessionData.userId));

    c.set('user', user ?? null);
    return next();
  };
}
