import { createHash, timingSafeEqual } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

export function hashKeyForLogging(key: string): string {
  // Stable, short hash for log messages (avoid leaking identifiers or tokens).
  return sha256Hex(key).substring(0, 32);
}

/**
 * Compare two strings without short-circuiting on the first differing byte.
 * Both sides are digested first so unequal lengths take the same path.
 */
export function safeEquals(candidate: string, expected: string): boolean {
  const left = createHash('sha256').update(candidate).digest();
  const right = createHash('sha256').update(expected).digest();
  return timingSafeEqual(left, right) && candidate.length === expected.length;
}
