import { sql } from 'drizzle-orm';
import { pgTable, text, timestamp, integer, index, varchar, check } from 'drizzle-orm/pg-core';

/**
 * Tracks searches made by guest (unauthenticated) visitors.
 *
 * One row per client key. The key is a SHA-256 hash of the visitor's IP
 * (optionally combined with the user agent), so clearing cookies or switching
 * to a private window does not reset the count.
 *
 * Reset is lazy: a row whose `updatedAt` is a full window old counts as zero,
 * and the next recorded search rewrites it to 1 in the same statement.
 *
 * See packages/shared/src/constants.ts for GUEST_SEARCH_LIMIT.
 */
export const guestUsage = pgTable(
  'guest_usage',
  {
    id: text('id')
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    clientKey: varchar('client_key', { length: 128 }).notNull().unique(),
    // Searches since the last reset
    searchCount: integer('search_count').notNull().default(0),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).defaultNow().notNull(),
    lastSeenAt: timestamp('last_seen_at', { withTimezone: true }).defaultNow().notNull(),
    // Moves whenever searchCount changes, including resets
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('guest_usage_last_seen_at_idx').on(table.lastSeenAt),
    check('guest_usage_search_count_non_negative', sql`${table.searchCount} >= 0`),
    check('guest_usage_seen_order', sql`${table.firstSeenAt} <= ${table.lastSeenAt}`),
  ]
);
