export {
  createDb,
  createDbHandle,
  LOCAL_NEON_DEV_CONFIG,
  type Database,
  type CreateDbOptions,
  type DbHandle,
} from './client';
export { users, guestUsage } from './schema/index';
export { hashPassword, verifyPassword } from './utils/password';
