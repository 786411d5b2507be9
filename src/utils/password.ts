import { createHash, timingSafeEqual } from 'crypto';

/**
 * SHA-256 hex digest of the UTF-8 bytes of a password
 */
export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

/**
 * Recompute the digest and compare it with the stored one
 */
export function verifyPassword(storedHash: string, password: string): boolean {
  const expected = Buffer.from(storedHash, 'utf8');
  const actual = Buffer.from(hashPassword(password), 'utf8');

  if (expected.length !== actual.length) {
    return false;
  }
  return timingSafeEqual(expected, actual);
}
