import { randomBytes } from 'crypto';

/** Opaque single-use token for email links */
export function generateToken(): string {
  return randomBytes(32).toString('hex');
}
