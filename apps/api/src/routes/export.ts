import { Hono } from 'hono';
import { exportRequestSchema } from '@leadscout/shared';
import type { AppEnv } from '../types.js';
import {
  EXPORT_CONTENT_TYPES,
  exportFilename,
  leadsToCsv,
  leadsToXlsx,
} from '../services/export/index.js';
import { validateJson } from '../lib/validate.js';

/**
 * POST / - download leads as a CSV or Excel attachment. Open to guests: the
 * leads come from a search that was already counted.
 */
export function createExportRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post('/', validateJson(exportRequestSchema), async (c) => {
    const { leads, format } = c.req.valid('json');
    const body = format === 'xlsx' ? await leadsToXlsx(leads) : leadsToCsv(leads);

    c.header('Content-Type', EXPORT_CONTENT_TYPES[format]);
    c.header('Content-Disposition', `attachment; filename="${exportFilename(format)}"`);
    return c.body(body, 200);
  });

  return app;
}
