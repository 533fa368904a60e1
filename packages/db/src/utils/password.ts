import {
  hashPassword as scryptHash,
  verifyPassword as scryptVerify,
} from 'better-auth/crypto';

/**
 * Hash a password as `salt:key` hex (scrypt, NFKC-normalized input).
 */
export function hashPassword(password: string): Promise<string> {
  return scryptHash(password);
}

export function verifyPassword(hash: string, password: string): Promise<boolean> {
  return scryptVerify({ hash, password });
}
