import { describe, it, expect } from 'vitest';
import {
  getSessionOptions,
  isValidSession,
  SESSION_COOKIE_NAME,
  SESSION_MAX_AGE_SECONDS,
} from './session.js';

describe('session', () => {
  const testSecret = 'test-secret-test-secret-test-secret';

  describe('getSessionOptions', () => {
    it('uses the project cookie name and secret', () => {
      const options = getSessionOptions(testSecret, false);

      expect(options.password).toBe(testSecret);
      expect(options.cookieName).toBe(SESSION_COOKIE_NAME);
    });

    it('sets a non-secure cookie outside production', () => {
      const options = getSessionOptions(testSecret, false);

      expect(options.cookieOptions).toEqual({
        httpOnly: true,
        secure: false,
        sameSite: 'lax',
        maxAge: SESSION_MAX_AGE_SECONDS,
      });
    });

    it('sets a secure cookie in production', () => {
      expect(getSessionOptions(testSecret, true).cookieOptions?.secure).toBe(true);
    });
  });

  describe('isValidSession', () => {
    it('accepts a populated session', () => {
      expect(isValidSession({ userId: 'user-1', email: 'a@test.leadscout.dev', createdAt: 1 })).toBe(
        true
      );
    });

    it('rejects an empty session object', () => {
      expect(isValidSession({})).toBe(false);
    });

    it('rejects an empty user id', () => {
      expect(isValidSession({ userId: '', email: 'a@test.leadscout.dev' })).toBe(false);
    });

    it('rejects non-objects', () => {
      expect(isValidSession(null)).toBe(false);
      expect(isValidSession('user-1')).toBe(false);
    });
  });
});
