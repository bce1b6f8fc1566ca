/**
 * Content fingerprinting for migration units
 */

import { createHash } from 'node:crypto';

/**
 * Lower-case hex SHA-256 of the content. Strings are hashed as UTF-8, so
 * a file's bytes and its decoded text give the same digest.
 */
export function fingerprint(content: string | Buffer): string {
  const hash = createHash('sha256');
  hash.update(content);
  return hash.digest('hex');
}

/**
 * Shortened hash for diagnostics
 */
export function hashPrefix(hash: string, length = 16): string {
  return hash.slice(0, length);
}
