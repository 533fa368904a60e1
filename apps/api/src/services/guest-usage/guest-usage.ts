import { eq, lt, sql } from 'drizzle-orm';
import { guestUsage, type Database } from '@leadscout/db';
import {
  GUEST_SEARCH_LIMIT,
  GUEST_USAGE_RETENTION_DAYS,
  GUEST_WINDOW_MS,
  hasElapsed,
  subtractDays,
  subtractMs,
} from '@leadscout/shared';

export type GuestDenyReason = 'daily_limit_reached' | 'client_unidentified' | 'storage_unavailable';

export type GuestUsageDecision =
  | { allowed: true; searchCount: number; remaining: number; limit: number }
  | { allowed: false; reason: GuestDenyReason; limit: number };

export type GuestUsageRecordResult =
  | { recorded: true; searchCount: number; remaining: number }
  | { recorded: false; reason: GuestDenyReason };

export interface GuestUsageOptions {
  /** Searches allowed per window (default GUEST_SEARCH_LIMIT) */
  limit?: number;
  now?: Date;
  /** Window length in ms (default GUEST_WINDOW_MS) */
  windowMs?: number;
}

interface UsageSnapshot {
  searchCount: number;
  updatedAt: Date;
}

/**
 * Count that applies right now. A row untouched for a whole window counts
 * as zero; the stored value is only rewritten by the next recorded search.
 */
function effectiveSearchCount(
  record: UsageSnapshot | undefined,
  now: Date,
  windowMs: number
): number {
  if (!record || hasElapsed(record.updatedAt, windowMs, now)) {
    return 0;
  }
  return record.searchCount;
}

async function findUsage(db: Database, clientKey: string): Promise<UsageSnapshot | undefined> {
  const [record] = await db
    .select({ searchCount: guestUsage.searchCount, updatedAt: guestUsage.updatedAt })
    .from(guestUsage)
    .where(eq(guestUsage.clientKey, clientKey))
    .limit(1);
  return record;
}

/**
 * Decide whether a guest may run a search.
 *
 * Advisory only: it lets callers skip the places API call when the guest is
 * obviously over the limit. The ceiling itself is enforced by
 * recordGuestSearch. Fails closed on a missing key or any storage error.
 *
 * @param clientKey - Hashed client identity, or null if it could not be resolved
 */
export async function authorizeGuestSearch(
  db: Database,
  clientKey: string | null,
  options: GuestUsageOptions = {}
): Promise<GuestUsageDecision> {
  const { limit = GUEST_SEARCH_LIMIT, now = new Date(), windowMs = GUEST_WINDOW_MS } = options;

  if (clientKey === null) {
    return { allowed: false, reason: 'client_unidentified', limit };
  }

  let record: UsageSnapshot | undefined;
  try {
    record = await findUsage(db, clientKey);
  } catch (error) {
    console.error('[guest-usage] Failed to read usage:', error);
    return { allowed: false, reason: 'storage_unavailable', limit };
  }

  const searchCount = effectiveSearchCount(record, now, windowMs);
  if (searchCount >= limit) {
    return { allowed: false, reason: 'daily_limit_reached', limit };
  }

  return { allowed: true, searchCount, remaining: limit - searchCount, limit };
}

/**
 * Record a search that actually ran, in one atomic statement.
 *
 * The upsert creates the row at 1, resets a window-old row to 1, or
 * increments a row still under the limit. A row already at the limit is left
 * untouched and nothing is returned, which is reported as
 * `daily_limit_reached`: the caller must treat it as a deny.
 */
export async function recordGuestSearch(
  db: Database,
  clientKey: string | null,
  options: GuestUsageOptions = {}
): Promise<GuestUsageRecordResult> {
  const { limit = GUEST_SEARCH_LIMIT, now = new Date(), windowMs = GUEST_WINDOW_MS } = options;

  if (clientKey === null) {
    return { recorded: false, reason: 'client_unidentified' };
  }
  // A fresh insert always lands at 1, so a zero limit never reaches the upsert
  if (limit <= 0) {
    return { recorded: false, reason: 'daily_limit_reached' };
  }

  const windowStart = subtractMs(now, windowMs).toISOString();
  const windowExpired = sql`${guestUsage.updatedAt} <= ${windowStart}::timestamptz`;

  let rows: { searchCount: number }[];
  try {
    rows = await db
      .insert(guestUsage)
      .values({
        clientKey,
        searchCount: 1,
        firstSeenAt: now,
        lastSeenAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: guestUsage.clientKey,
        set: {
          searchCount: sql`CASE WHEN ${windowExpired} THEN 1 ELSE ${guestUsage.searchCount} + 1 END`,
          lastSeenAt: now,
          updatedAt: now,
        },
        setWhere: sql`${windowExpired} OR ${guestUsage.searchCount} < ${limit}`,
      })
      .returning({ searchCount: guestUsage.searchCount });
  } catch (error) {
    console.error('[guest-usage] Failed to record search:', error);
    return { recorded: false, reason: 'storage_unavailable' };
  }

  const [row] = rows;
  if (!row) {
    return { recorded: false, reason: 'daily_limit_reached' };
  }

  return { recorded: true, searchCount: row.searchCount, remaining: Math.max(0, limit - row.searchCount) };
}

export interface PruneGuestUsageOptions {
  retentionDays?: number;
  now?: Date;
}

/**
 * Delete rows whose last activity is older than the retention period.
 * Storage hygiene only: lazy reset keeps counts correct without it.
 *
 * @returns Number of deleted rows
 */
export async function pruneGuestUsage(
  db: Database,
  options: PruneGuestUsageOptions = {}
): Promise<number> {
  const { retentionDays = GUEST_USAGE_RETENTION_DAYS, now = new Date() } = options;
  const cutoff = subtractDays(now, retentionDays);

  const deleted = await db
    .delete(guestUsage)
    .where(lt(guestUsage.lastSeenAt, cutoff))
    .returning({ id: guestUsage.id });

  return deleted.length;
}
