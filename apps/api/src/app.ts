import { Hono } from 'hono';
import type { Database } from '@leadscout/db';
import { ERROR_CODE_NOT_FOUND } from '@leadscout/shared';
import {
  cors,
  csrfProtection,
  dbMiddleware,
  emailMiddleware,
  envMiddleware,
  errorHandler,
  ironSessionMiddleware,
  placesMiddleware,
  securityHeaders,
  userMiddleware,
} from './middleware/index.js';
import {
  createHealthRoutes,
  createAuthRoutes,
  createExportRoutes,
  createSearchRoutes,
  createUsersRoutes,
} from './routes/index.js';
import { createErrorResponse } from './lib/error-response.js';
import { ERROR_ROUTE_NOT_FOUND } from './constants/errors.js';
import type { EmailClient } from './services/email/index.js';
import type { PlacesClient } from './services/places/index.js';
import type { AppEnv } from './types.js';

export type { AppEnv, Bindings } from './types.js';

/** Clients to use instead of the ones built from bindings */
export interface AppDependencies {
  db?: Database;
  places?: PlacesClient;
  email?: EmailClient;
}

export function createApp(dependencies: AppDependencies = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use('*', cors());
  app.use('*', securityHeaders());
  app.onError(errorHandler);
  app.notFound((c) => c.json(createErrorResponse(ERROR_ROUTE_NOT_FOUND, ERROR_CODE_NOT_FOUND), 404));

  app.route('/health', createHealthRoutes());

  app.use('*', envMiddleware());
  app.use('*', csrfProtection());
  app.use('*', dbMiddleware(dependencies.db));
  app.use('*', ironSessionMiddleware());
  app.use('*', userMiddleware());

  app.use('/search', placesMiddleware(dependencies.places));
  app.route('/search', createSearchRoutes());

  app.route('/export', createExportRoutes());

  app.use('/auth/*', emailMiddleware(dependencies.email));
  app.route('/auth', createAuthRoutes());

  app.use('/users/*', emailMiddleware(dependencies.email));
  app.route('/users', createUsersRoutes());

  return app;
}
