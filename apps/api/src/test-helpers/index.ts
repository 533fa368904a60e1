import { sealData } from 'iron-session';
import { hashPassword, users, type Database } from '@leadscout/db';
import { userFactory } from '@leadscout/db/factories';
import type { Place, PlacesClient } from '../services/places/index.js';
import { SESSION_COOKIE_NAME, type SessionData } from '../lib/session.js';
import type { AuthUser, Bindings } from '../types.js';

export const TEST_SESSION_SECRET = 'test-secret-test-secret-test-secret';
export const TEST_PASSWORD = 'test-password';
export const GUEST_IP = '203.0.113.7';

export const TEST_ENV: Bindings = {
  NODE_ENV: 'test',
  IRON_SESSION_SECRET: TEST_SESSION_SECRET,
  FRONTEND_URL: 'http://localhost:5173',
};

/** Request init for a JSON body */
export function jsonRequest(
  method: string,
  body: unknown,
  headers: Record<string, string> = {}
): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export async function createTestUser(
  db: Database,
  overrides: Partial<typeof users.$inferInsert> = {}
): Promise<AuthUser> {
  const row = userFactory.build({ passwordHash: await hashPassword(TEST_PASSWORD), ...overrides });
  const [created] = await db.insert(users).values(row).returning({
    id: users.id,
    email: users.email,
    name: users.name,
    emailVerified: users.emailVerified,
    createdAt: users.createdAt,
  });
  if (!created) {
    throw new Error('Failed to insert test user');
  }
  return created;
}

export async function sessionCookieFor(user: Pick<AuthUser, 'id' | 'email'>): Promise<string> {
  const session: SessionData = { userId: user.id, email: user.email, createdAt: Date.now() };
  const sealed = await sealData(session, { password: TEST_SESSION_SECRET });
  return `${SESSION_COOKIE_NAME}=${sealed}`;
}

/**
 * Places client with programmable results that counts its calls.
 */
export function createStubPlacesClient(options: {
  places?: Place[];
  onSearch?: () => Promise<void>;
  geocodeError?: Error;
  searchError?: Error;
} = {}): PlacesClient & { searchCalls: () => number } {
  let calls = 0;
  return {
    isMock: true,
    geocode: () =>
      options.geocodeError
        ? Promise.reject(options.geocodeError)
        : Promise.resolve({ lat: 30.25, lng: -97.75 }),
    searchText: async () => {
      calls++;
      await options.onSearch?.();
      if (options.searchError) {
        throw options.searchError;
      }
      return options.places ?? [];
    },
    searchCalls: () => calls,
  };
}
