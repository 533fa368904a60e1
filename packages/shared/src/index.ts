export * from './constants.js';
export * from './env.js';
export * from './env.config.js';
export * from './utils/date.js';
export * from './schemas/api/error.js';
export * from './schemas/api/search.js';
export * from './schemas/api/auth.js';
