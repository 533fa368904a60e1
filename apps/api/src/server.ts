import { IncomingMessage } from 'node:http';
import { serve } from '@hono/node-server';
import { parseEnv } from '@leadscout/shared';
import { createApp } from './app.js';
import type { Bindings } from './types.js';

const env = parseEnv(process.env);
const app = createApp();

const server = serve(
  {
    fetch: (request, nodeBindings) => {
      const bindings: Bindings = {
        ...env,
        incoming: nodeBindings.incoming instanceof IncomingMessage ? nodeBindings.incoming : undefined,
      };
      return app.fetch(request, bindings);
    },
    port: env.PORT,
  },
  (info) => {
    console.log(`[api] Listening on http://localhost:${String(info.port)} (${env.NODE_ENV})`);
  }
);

function shutdown(signal: string): void {
  console.log(`[api] ${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      console.error('[api] Failed to close server:', error);
      process.exitCode = 1;
    }
  });
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  shutdown('SIGINT');
});
