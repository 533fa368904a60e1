import type { SessionOptions } from 'iron-session';

export const SESSION_COOKIE_NAME = 'leadscout_session';
export const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24 * 30; // 30 days

export interface SessionData {
  userId: string;
  email: string;
  createdAt: number;
}

export function getSessionOptions(secret: string, isProduction: boolean): SessionOptions {
  return {
    password: secret,
    cookieName: SESSION_COOKIE_NAME,
    cookieOptions: {
      httpOnly: true,
      secure: isProduction,
      sameSite: 'lax',
      maxAge: SESSION_MAX_AGE_SECONDS,
    },
  };
}

export function isValidSession(session: unknown): session is SessionData {
  if (!session || typeof session !== 'object') {
    return false;
  }

  return (
    'userId' in session &&
    typeof session.userId === 'string' &&
    session.userId.length > 0 &&
    'email' in session &&
    typeof session.email === 'string'
  );
}
