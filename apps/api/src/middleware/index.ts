export { cors } from './cors.js';
export { csrfProtection } from './csrf.js';
export { securityHeaders } from './security.js';
export { errorHandler } from './error.js';
export { requireAuth } from './require-auth.js';
export {
  dbMiddleware,
  placesMiddleware,
  emailMiddleware,
  envMiddleware,
  ironSessionMiddleware,
  userMiddleware,
} from './dependencies.js';
