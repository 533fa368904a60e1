import { pgTable, text, timestamp, boolean, index, varchar } from 'drizzle-orm/pg-core';

export const users = pgTable(
  'users',
  {
    id: text('id')
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    // Stored lower-cased; uniqueness is case-insensitive by construction
    email: text('email').notNull().unique(),
    name: varchar('name', { length: 100 }),
    passwordHash: text('password_hash').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),

    emailVerified: boolean('email_verified').notNull().default(false),
    emailVerifyToken: text('email_verify_token'),
    emailVerifyExpires: timestamp('email_verify_expires', { withTimezone: true }),

    passwordResetToken: text('password_reset_token'),
    passwordResetExpires: timestamp('password_reset_expires', { withTimezone: true }),
  },
  (table) => [
    index('idx_users_email_verify_token').on(table.emailVerifyToken),
    index('idx_users_password_reset_token').on(table.passwordResetToken),
  ]
);
