import { config } from 'dotenv';
import { defineConfig } from 'drizzle-kit';

config({ path: '../../.env.development' });

// Schema pushes need a direct TCP connection; the neon websocket proxy is for the API only
const url = process.env['MIGRATION_DATABASE_URL'] ?? process.env['DATABASE_URL'];

if (!url) {
  throw new Error('MIGRATION_DATABASE_URL or DATABASE_URL is required for drizzle-kit');
}

export default defineConfig({
  schema: './src/schema/index.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: { url },
  strict: true,
  verbose: true,
});
