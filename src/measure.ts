/**
 * Output Hashing
 *
 * Hashes for written output and line-ending cleanup.
 */

import { createHash } from 'node:crypto';

/**
 * Compute SHA-256 hash of a string or of raw bytes.
 */
export function computeHash(data: string | Uint8Array): string {
  const hash = createHash('sha256');
  if (typeof data === 'string') {
    hash.update(data, 'utf8');
  } else {
    hash.update(data);
  }
  return hash.digest('hex');
}

/**
 * Normalize line endings to LF.
 */
export function normalizeLineEndings(str: string): string {
  return str.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}
