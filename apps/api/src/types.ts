import type { IncomingMessage } from 'node:http';
import type { Database } from '@leadscout/db';
import type { EnvUtilities } from '@leadscout/shared';
import type { EmailClient } from './services/email/index.js';
import type { PlacesClient } from './services/places/index.js';
import type { SessionData } from './lib/session.js';

/**
 * Per-request bindings: the validated process environment plus the Node
 * request, which @hono/node-server passes as `incoming`.
 */
export interface Bindings {
  NODE_ENV?: string;
  CI?: string;
  DATABASE_URL?: string;
  IRON_SESSION_SECRET?: string;
  FRONTEND_URL?: string;
  GOOGLE_MAPS_API_KEY?: string;
  RESEND_API_KEY?: string;
  GUEST_DAILY_SEARCH_LIMIT?: number;
  GUEST_KEY_INCLUDE_USER_AGENT?: boolean;
  incoming?: IncomingMessage;
}

export interface AuthUser {
  id: string;
  email: string;
  name: string | null;
  emailVerified: boolean;
  createdAt: Date;
}

export interface Variables {
  db: Database;
  envUtils: EnvUtilities;
  places: PlacesClient;
  email: EmailClient;
  sessionData: SessionData | null;
  user: AuthUser | null;
}

export interface AppEnv {
  Bindings: Bindings;
  Variables: Variables;
}
