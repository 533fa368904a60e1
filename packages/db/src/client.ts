import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle } from 'drizzle-orm/neon-serverless';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import ws from 'ws';

import * as schema from './schema/index';

neonConfig.webSocketConstructor = ws;

export interface CreateDbOptions {
  connectionString: string;
  /** Route through a local websocket proxy in front of plain Postgres */
  neonDev?: NeonDevConfig | undefined;
}

export interface NeonDevConfig {
  useSecureWebSocket: boolean;
  pipelineTLS: boolean;
  pipelineConnect: false;
}

/** Settings for the local neon websocket proxy used in development */
export const LOCAL_NEON_DEV_CONFIG: NeonDevConfig = {
  useSecureWebSocket: false,
  pipelineTLS: false,
  pipelineConnect: false,
};

/**
 * Any Drizzle Postgres database over the project schema.
 * Production uses the neon driver; tests use an in-process PGlite instance.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

/** A database plus the means to release its connections */
export interface DbHandle {
  db: Database;
  close: () => Promise<void>;
}

/**
 * Pooled client for long-running processes that share it per request.
 */
export function createDb(options: CreateDbOptions): Database {
  return createDbHandle(options).db;
}

/**
 * Like `createDb`, for one-shot processes that must close the pool to exit.
 */
export function createDbHandle(options: CreateDbOptions): DbHandle {
  const { connectionString, neonDev } = options;

  if (neonDev) {
    neonConfig.wsProxy = (host, port) => `${host}:${String(port)}/v1`;
    neonConfig.useSecureWebSocket = neonDev.useSecureWebSocket;
    neonConfig.pipelineTLS = neonDev.pipelineTLS;
    neonConfig.pipelineConnect = neonDev.pipelineConnect;
  }

  const pool = new Pool({ connectionString });
  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
