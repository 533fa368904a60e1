import { readFileSync } from 'node:fs';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';

import * as schema from './schema/index';
import type { DbHandle } from './client';

const SCHEMA_SQL = readFileSync(new URL('sql/schema.sql', import.meta.url), 'utf8');

export interface TestDatabase extends DbHandle {
  /** Remove every row, keeping the tables */
  truncate: () => Promise<void>;
}

/**
 * Create an in-process Postgres (PGlite) loaded with the project schema.
 * Each call is isolated; share one per test file and truncate between tests.
 */
export async function createTestDb(): Promise<TestDatabase> {
  const client = new PGlite();
  await client.exec(SCHEMA_SQL);

  return {
    db: drizzle(client, { schema }),
    truncate: async () => {
      await client.exec('TRUNCATE TABLE guest_usage, users');
    },
    close: () => client.close(),
  };
}

/**
 * Create a database handle with no tables, so every query fails.
 * Used to exercise storage-failure paths.
 */
export async function createBrokenTestDb(): Promise<TestDatabase> {
  const client = new PGlite();
  await client.waitReady;

  return {
    db: drizzle(client, { schema }),
    truncate: () => Promise.resolve(),
    close: () => client.close(),
  };
}
