import { z } from 'zod';
import { GUEST_SEARCH_LIMIT } from './constants.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

/**
 * Runtime validation for the API process environment.
 *
 * Optional third-party keys fall back to mock or console clients outside
 * production; see the service factories for the exact rules.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CI: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8787),
  DATABASE_URL: z.string().min(1),
  IRON_SESSION_SECRET: z.string().min(32),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  GOOGLE_MAPS_API_KEY: z.string().min(1).optional(),
  RESEND_API_KEY: z.string().min(1).optional(),
  GUEST_DAILY_SEARCH_LIMIT: z.coerce.number().int().min(0).default(GUEST_SEARCH_LIMIT),
  GUEST_KEY_INCLUDE_USER_AGENT: booleanFlag,
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate raw environment variables.
 * Throws with every failing variable listed.
 */
export function parseEnv(raw: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}
