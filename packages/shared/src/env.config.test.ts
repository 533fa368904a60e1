import { describe, it, expect } from 'vitest';
import { parseEnv } from './env.config.js';
import { GUEST_SEARCH_LIMIT } from './constants.js';

const TEST_SECRET = 'test-secret-test-secret-test-secret';

describe('parseEnv', () => {
  it('applies defaults for optional settings', () => {
    const env = parseEnv({
      DATABASE_URL: 'postgres://localhost/leadscout_test',
      IRON_SESSION_SECRET: TEST_SECRET,
    });

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(8787);
    expect(env.FRONTEND_URL).toBe('http://localhost:5173');
    expect(env.GUEST_DAILY_SEARCH_LIMIT).toBe(GUEST_SEARCH_LIMIT);
    expect(env.GUEST_KEY_INCLUDE_USER_AGENT).toBe(false);
    expect(env.GOOGLE_MAPS_API_KEY).toBeUndefined();
  });

  it('coerces numeric and boolean settings', () => {
    const env = parseEnv({
      DATABASE_URL: 'postgres://localhost/leadscout_test',
      IRON_SESSION_SECRET: TEST_SECRET,
      PORT: '3000',
      GUEST_DAILY_SEARCH_LIMIT: '10',
      GUEST_KEY_INCLUDE_USER_AGENT: 'true',
    });

    expect(env.PORT).toBe(3000);
    expect(env.GUEST_DAILY_SEARCH_LIMIT).toBe(10);
    expect(env.GUEST_KEY_INCLUDE_USER_AGENT).toBe(true);
  });

  it('rejects a short session secret', () => {
    expect(() =>
      parseEnv({ DATABASE_URL: 'postgres://localhost/leadscout_test', IRON_SESSION_SECRET: 'short' })
    ).toThrow(/IRON_SESSION_SECRET/);
  });

  it('lists a missing database url', () => {
    expect(() => parseEnv({ IRON_SESSION_SECRET: TEST_SECRET })).toThrow(/DATABASE_URL/);
  });
});
