import { Hono } from 'hono';
import { eq } from 'drizzle-orm';
import { getIronSession } from 'iron-session';
import { hashPassword, users, verifyPassword } from '@leadscout/db';
import {
  addMs,
  emailRequestSchema,
  ERROR_CODE_AUTH_FAILED,
  ERROR_CODE_CONFLICT,
  ERROR_CODE_EMAIL_NOT_VERIFIED,
  ERROR_CODE_INVALID_OR_EXPIRED_TOKEN,
  loginRequestSchema,
  registerRequestSchema,
  resetPasswordRequestSchema,
  tokenRequestSchema,
} from '@leadscout/shared';
import type { AppEnv } from '../types.js';
import { createErrorResponse } from '../lib/error-response.js';
import { toProfile } from '../lib/profile.js';
import { getSessionOptions, type SessionData } from '../lib/session.js';
import { generateToken } from '../lib/tokens.js';
import { validateJson } from '../lib/validate.js';
import { createAccountMailer } from '../services/email/index.js';
import { EMAIL_VERIFY_TOKEN_EXPIRY_MS, PASSWORD_RESET_TOKEN_EXPIRY_MS } from '../constants/auth.js';
import {
  ERROR_EMAIL_NOT_VERIFIED,
  ERROR_EMAIL_TAKEN,
  ERROR_INVALID_CREDENTIALS,
  ERROR_INVALID_OR_EXPIRED_TOKEN,
} from '../constants/errors.js';

const profileColumns = {
  id: users.id,
  email: users.email,
  name: users.name,
  emailVerified: users.emailVerified,
  createdAt: users.createdAt,
};

function requireSessionSecret(secret: string | undefined): string {
  if (!secret) {
    throw new Error('IRON_SESSION_SECRET is required');
  }
  return secret;
}

function isExpired(expires: Date | null, now: Date): boolean {
  return expires === null || expires.getTime() <= now.getTime();
}

export function createAuthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app
    // POST /register - create an unverified account and email a verification link
    .post('/register', validateJson(registerRequestSchema), async (c) => {
      const { email, password, name } = c.req.valid('json');
      const db = c.get('db');

      const now = new Date();
      const token = generateToken();
      const [created] = await db
        .insert(users)
        .values({
          email,
          name: name ?? null,
          passwordHash: await hashPassword(password),
          emailVerified: false,
          emailVerifyToken: token,
          emailVerifyExpires: addMs(now, EMAIL_VERIFY_TOKEN_EXPIRY_MS),
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing({ target: users.email })
        .returning(profileColumns);
      // No row: the email is already registered
      if (!created) {
        return c.json(createErrorResponse(ERROR_EMAIL_TAKEN, ERROR_CODE_CONFLICT), 409);
      }

      createAccountMailer(c.get('email'), c.env?.FRONTEND_URL).sendVerification(created, token);

      return c.json({ user: toProfile(created) }, 201);
    })

    // POST /login - start a session for a verified user
    .post('/login', validateJson(loginRequestSchema), async (c) => {
      const { email, password } = c.req.valid('json');
      const sessionSecret = requireSessionSecret(c.env?.IRON_SESSION_SECRET);

      const [user] = await c
        .get('db')
        .select({ ...profileColumns, passwordHash: users.passwordHash })
        .from(users)
        .where(eq(users.email, email));

      if (!user || !(await verifyPassword(user.passwordHash, password))) {
        return c.json(createErrorResponse(ERROR_INVALID_CREDENTIALS, ERROR_CODE_AUTH_FAILED), 401);
      }
      if (!user.emailVerified) {
        return c.json(
          createErrorResponse(ERROR_EMAIL_NOT_VERIFIED, ERROR_CODE_EMAIL_NOT_VERIFIED),
          403
        );
      }

      const session = await getIronSession<SessionData>(
        c.req.raw,
        c.res,
        getSessionOptions(sessionSecret, c.get('envUtils').isProduction)
      );
      session.userId = user.id;
      session.email = user.email;
      session.createdAt = Date.now();
      await session.save();

      return c.json({ user: toProfile(user) }, 200);
    })

    // POST /logout - clear the session cookie
    .post('/logout', async (c) => {
      const secret = c.env?.IRON_SESSION_SECRET;
      if (secret) {
        const session = await getIronSession<SessionData>(
          c.req.raw,
          c.res,
          getSessionOptions(secret, c.get('envUtils').isProduction)
        );
        session.destroy();
      }
      return c.json({ success: true as const }, 200);
    })

    // POST /verify-email - confirm the address from the emailed token
    .post('/verify-email', validateJson(tokenRequestSchema), async (c) => {
      const { token } = c.req.valid('json');
      const db = c.get('db');
      const now = new Date();

      const [user] = await db
        .select({ id: users.id, expires: users.emailVerifyExpires })
        .from(users)
        .where(eq(users.emailVerifyToken, token));

      if (!user || isExpired(user.expires, now)) {
        return c.json(
          createErrorResponse(ERROR_INVALID_OR_EXPIRED_TOKEN, ERROR_CODE_INVALID_OR_EXPIRED_TOKEN),
          400
        );
      }

      await db
        .update(users)
        .set({ emailVerified: true, emailVerifyToken: null, emailVerifyExpires: null, updatedAt: now })
        .where(eq(users.id, user.id));

      return c.json({ success: true as const }, 200);
    })

    // POST /resend-verification - always 200 so addresses cannot be enumerated
    .post('/resend-verification', validateJson(emailRequestSchema), async (c) => {
      const { email } = c.req.valid('json');
      const db = c.get('db');

      const [user] = await db
        .select({ id: users.id, name: users.name, emailVerified: users.emailVerified })
        .from(users)
        .where(eq(users.email, email));

      if (user && !user.emailVerified) {
        const now = new Date();
        const token = generateToken();
        await db
          .update(users)
          .set({
            emailVerifyToken: token,
            emailVerifyExpires: addMs(now, EMAIL_VERIFY_TOKEN_EXPIRY_MS),
            updatedAt: now,
          })
          .where(eq(users.id, user.id));

        createAccountMailer(c.get('email'), c.env?.FRONTEND_URL).sendVerification(
          { email, name: user.name },
          token
        );
      }

      return c.json({ success: true as const }, 200);
    })

    // POST /forgot-password - always 200 so addresses cannot be enumerated
    .post('/forgot-password', validateJson(emailRequestSchema), async (c) => {
      const { email } = c.req.valid('json');
      const db = c.get('db');

      const [user] = await db
        .select({ id: users.id, name: users.name })
        .from(users)
        .where(eq(users.email, email));

      if (user) {
        const now = new Date();
        const token = generateToken();
        await db
          .update(users)
          .set({
            passwordResetToken: token,
            passwordResetExpires: addMs(now, PASSWORD_RESET_TOKEN_EXPIRY_MS),
            updatedAt: now,
          })
          .where(eq(users.id, user.id));

        createAccountMailer(c.get('email'), c.env?.FRONTEND_URL).sendPasswordReset(
          { email, name: user.name },
          token
        );
      }

      return c.json({ success: true as const }, 200);
    })

    // POST /reset-password - set a new password from the emailed token
    .post('/reset-password', validateJson(resetPasswordRequestSchema), async (c) => {
      const { token, password } = c.req.valid('json');
      const db = c.get('db');
      const now = new Date();

      const [user] = await db
        .select({
          id: users.id,
          email: users.email,
          name: users.name,
          expires: users.passwordResetExpires,
        })
        .from(users)
        .where(eq(users.passwordResetToken, token));

      if (!user || isExpired(user.expires, now)) {
        return c.json(
          createErrorResponse(ERROR_INVALID_OR_EXPIRED_TOKEN, ERROR_CODE_INVALID_OR_EXPIRED_TOKEN),
          400
        );
      }

      // Following the emailed link proves the address
      await db
        .update(users)
        .set({
          passwordHash: await hashPassword(password),
          passwordResetToken: null,
          passwordResetExpires: null,
          emailVerified: true,
          updatedAt: now,
        })
        .where(eq(users.id, user.id));

      createAccountMailer(c.get('email'), c.env?.FRONTEND_URL).sendPasswordChanged(user);

      return c.json({ success: true as const }, 200);
    });

  return app;
}
