import { Hono } from 'hono';
import { eq } from 'drizzle-orm';
import { hashPassword, users, verifyPassword } from '@leadscout/db';
import { ERROR_CODE_INCORRECT_PASSWORD, ERROR_CODE_NOT_FOUND, updateProfileRequestSchema } from '@leadscout/shared';
import type { AppEnv } from '../types.js';
import { createErrorResponse } from '../lib/error-response.js';
import { toProfile } from '../lib/profile.js';
import { validateJson } from '../lib/validate.js';
import { requireAuth } from '../middleware/require-auth.js';
import { createAccountMailer } from '../services/email/index.js';
import { ERROR_INCORRECT_PASSWORD, ERROR_USER_NOT_FOUND } from '../constants/errors.js';

export function createUsersRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app
    .use('*', requireAuth())
    .get('/me', (c) => {
      const user = c.get('user');
      if (!user) {
        return c.json(createErrorResponse(ERROR_USER_NOT_FOUND, ERROR_CODE_NOT_FOUND), 404);
      }
      return c.json({ user: toProfile(user) }, 200);
    })
    .patch('/me', validateJson(updateProfileRequestSchema), async (c) => {
      const user = c.get('user');
      if (!user) {
        return c.json(createErrorResponse(ERROR_USER_NOT_FOUND, ERROR_CODE_NOT_FOUND), 404);
      }
      const { name, currentPassword, newPassword } = c.req.valid('json');
      const db = c.get('db');

      const changes: Partial<typeof users.$inferInsert> = {};
      if (name !== undefined) {
        changes.name = name;
      }

      if (newPassword !== undefined) {
        const [stored] = await db
          .select({ passwordHash: users.passwordHash })
          .from(users)
          .where(eq(users.id, user.id));
        if (!stored || !(await verifyPassword(stored.passwordHash, currentPassword ?? ''))) {
          return c.json(
            createErrorResponse(ERROR_INCORRECT_PASSWORD, ERROR_CODE_INCORRECT_PASSWORD),
            401
          );
        }
        changes.passwordHash = await hashPassword(newPassword);
      }

      if (Object.keys(changes).length === 0) {
        return c.json({ user: toProfile(user) }, 200);
      }

      const [updated] = await db
        .update(users)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(users.id, user.id))
        .returning({
          id: users.id,
          email: users.email,
          name: users.name,
          emailVerified: users.emailVerified,
          createdAt: users.createdAt,
        });
      if (!updated) {
        return c.json(createErrorResponse(ERROR_USER_NOT_FOUND, ERROR_CODE_NOT_FOUND), 404);
      }

      if (changes.passwordHash !== undefined) {
        createAccountMailer(c.get('email'), c.env?.FRONTEND_URL).sendPasswordChanged(updated);
      }

      return c.json({ user: toProfile(updated) }, 200);
    });

  return app;
}
