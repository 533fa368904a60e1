export { createHealthRoutes } from './health.js';
export { createSearchRoutes } from './search.js';
export { createExportRoutes } from './export.js';
export { createAuthRoutes } from './auth.js';
export { createUsersRoutes } from './users.js';
