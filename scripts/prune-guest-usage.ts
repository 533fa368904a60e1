import { config } from 'dotenv';
import path from 'node:path';

import { createDbHandle, LOCAL_NEON_DEV_CONFIG, type Database, type DbHandle } from '@leadscout/db';
import { GUEST_USAGE_RETENTION_DAYS } from '@leadscout/shared';
import { pruneGuestUsage } from '@leadscout/api/guest-usage';

export interface PruneArgs {
  retentionDays: number;
}

export function parseArgs(args: string[]): PruneArgs {
  const flagIndex = args.indexOf('--days');
  if (flagIndex === -1) {
    return { retentionDays: GUEST_USAGE_RETENTION_DAYS };
  }

  const value = Number(args[flagIndex + 1]);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error('--days must be a positive integer');
  }
  return { retentionDays: value };
}

/** Delete guest usage rows idle for longer than the retention period. */
export async function prune(db: Database, args: PruneArgs, now: Date = new Date()): Promise<number> {
  console.log(`Pruning guest usage idle for more than ${String(args.retentionDays)} days...`);
  const deleted = await pruneGuestUsage(db, { retentionDays: args.retentionDays, now });
  console.log(`Deleted ${String(deleted)} guest usage rows`);
  return deleted;
}

/** Prune, then close the connection whether or not pruning succeeded. */
export async function runPrune(handle: DbHandle, args: PruneArgs, now?: Date): Promise<number> {
  try {
    return await prune(handle.db, args, now);
  } finally {
    await handle.close();
  }
}

async function main(): Promise<void> {
  config({ path: path.resolve(process.cwd(), '.env.development') });

  const connectionString = process.env['DATABASE_URL'];
  if (!connectionString) {
    throw new Error('DATABASE_URL is required');
  }

  const isProduction = process.env['NODE_ENV'] === 'production';
  const args = parseArgs(process.argv.slice(2));
  const handle = createDbHandle(
    isProduction ? { connectionString } : { connectionString, neonDev: LOCAL_NEON_DEV_CONFIG }
  );
  await runPrune(handle, args);
}

const isMain = import.meta.url === `file://${String(process.argv[1])}`;
if (isMain) {
  void (async () => {
    try {
      await main();
    } catch (error: unknown) {
      console.error('Prune failed:', error);
      process.exit(1);
    }
  })();
}
