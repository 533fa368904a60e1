import { describe, it, expect } from 'vitest';
import { hashPassword, verifyPassword } from './password';

const TEST_WRONG_CREDENTIAL = 'test-wrong-credential';

describe('hashPassword', () => {
  it('returns a string in salt:key format', async () => {
    const hash = await hashPassword('testpassword');
    expect(hash).toMatch(/^[0-9a-f]+:[0-9a-f]+$/);
  });

  it('produces different hashes for the same password', async () => {
    const hash1 = await hashPassword('samepassword');
    const hash2 = await hashPassword('samepassword');
    expect(hash1).not.toBe(hash2);
  });
});

describe('verifyPassword', () => {
  it('accepts the original password', async () => {
    const testCredential = 'test-secure-credential-123';
    const hash = await hashPassword(testCredential);

    await expect(verifyPassword(hash, testCredential)).resolves.toBe(true);
  });

  it('rejects a wrong password', async () => {
    const hash = await hashPassword('test-correct-credential');

    await expect(verifyPassword(hash, TEST_WRONG_CREDENTIAL)).resolves.toBe(false);
  });

  it('normalizes unicode before comparing', async () => {
    // "fi" ligature (U+FB01) normalizes to "fi" under NFKC
    const hash = await hashPassword('\uFB01le');

    await expect(verifyPassword(hash, 'file')).resolves.toBe(true);
  });
});
