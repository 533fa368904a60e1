import { Hono } from 'hono';
import type { AppEnv } from '../types.js';

export const SERVICE_NAME = 'leadscout-api';

/** GET / - liveness check. Mounted ahead of the database middleware. */
export function createHealthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get('/', (c) =>
    c.json({
      status: 'ok' as const,
      service: SERVICE_NAME,
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    })
  );

  return app;
}
