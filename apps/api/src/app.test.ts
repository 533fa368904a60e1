import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { users } from '@leadscout/db';
import { createTestDb, type TestDatabase } from '@leadscout/db/testing';
import { searchResponseSchema } from '@leadscout/shared';
import { createApp } from './app.js';
import { createMockEmailClient } from './services/email/index.js';
import { createMockPlacesClient } from './services/places/index.js';
import { GUEST_IP, jsonRequest, TEST_ENV, TEST_PASSWORD } from './test-helpers/index.js';

describe('createApp', () => {
  let testDb: TestDatabase;
  const email = createMockEmailClient();
  const places = createMockPlacesClient();

  beforeAll(async () => {
    testDb = await createTestDb();
  });

  afterEach(async () => {
    await testDb.truncate();
    email.clearSentEmails();
    places.clearHistory();
  });

  afterAll(async () => {
    await testDb.close();
  });

  function createTestApp() {
    return createApp({ db: testDb.db, places, email });
  }

  const SEARCH_BODY = { city: 'Springfield', businessType: 'florist', maxReviews: 50 };

  it('serves health checks without a database', async () => {
    const res = await createApp().request('/health', {}, TEST_ENV);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
  });

  it('answers unknown routes with the error format', async () => {
    const res = await createTestApp().request('/nowhere', {}, TEST_ENV);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', code: 'NOT_FOUND' });
  });

  it('rejects state changes from another origin', async () => {
    const res = await createTestApp().request(
      '/search',
      jsonRequest('POST', SEARCH_BODY, { Origin: 'https://evil.example', 'x-forwarded-for': GUEST_IP }),
      TEST_ENV
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'Cross-origin request rejected', code: 'FORBIDDEN' });
    expect(places.getSearchHistory()).toEqual([]);
  });

  it('limits guests, then lifts the limit after sign up', async () => {
    const app = createTestApp();
    const env = { ...TEST_ENV, GUEST_DAILY_SEARCH_LIMIT: 1 };
    const guestHeaders = { 'x-forwarded-for': GUEST_IP, Origin: 'http://localhost:5173' };

    const first = await app.request('/search', jsonRequest('POST', SEARCH_BODY, guestHeaders), env);
    expect(first.status).toBe(200);
    const firstBody = searchResponseSchema.parse(await first.json());
    expect(firstBody.leads.map((lead) => lead.placeId)).toEqual(['mock-place-1', 'mock-place-2']);
    expect(firstBody.remainingFreeSearches).toBe(0);

    const denied = await app.request('/search', jsonRequest('POST', SEARCH_BODY, guestHeaders), env);
    expect(denied.status).toBe(429);

    const register = await app.request(
      '/auth/register',
      jsonRequest('POST', { email: 'scout@test.leadscout.dev', password: TEST_PASSWORD }),
      env
    );
    expect(register.status).toBe(201);

    const [created] = await testDb.db
      .select({ token: users.emailVerifyToken })
      .from(users)
      .where(eq(users.email, 'scout@test.leadscout.dev'));
    const verify = await app.request(
      '/auth/verify-email',
      jsonRequest('POST', { token: created?.token }),
      env
    );
    expect(verify.status).toBe(200);

    const login = await app.request(
      '/auth/login',
      jsonRequest('POST', { email: 'scout@test.leadscout.dev', password: TEST_PASSWORD }),
      env
    );
    expect(login.status).toBe(200);
    const cookie = (login.headers.get('set-cookie') ?? '').split(';')[0] ?? '';

    const signedIn = await app.request(
      '/search',
      jsonRequest('POST', SEARCH_BODY, { ...guestHeaders, Cookie: cookie }),
      env
    );
    expect(signedIn.status).toBe(200);
    expect(searchResponseSchema.parse(await signedIn.json()).remainingFreeSearches).toBeUndefined();

    const exported = await app.request(
      '/export',
      jsonRequest('POST', { leads: firstBody.leads }, { Cookie: cookie }),
      env
    );
    expect(exported.status).toBe(200);
    expect((await exported.text()).split('\r\n')).toHaveLength(4);
  });

  it('allows credentialed preflight from the frontend', async () => {
    const res = await createTestApp().request(
      '/export',
      { method: 'OPTIONS', headers: { Origin: 'http://localhost:5173', 'Access-Control-Request-Method': 'POST' } },
      TEST_ENV
    );

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
    expect(res.headers.get('Access-Control-Allow-Credentials')).toBe('true');
  });
});
