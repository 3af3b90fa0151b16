/**
 * Release Radar: Content Hashing
 */

import { createHash } from 'crypto';

/**
 * Short, stable hex digest used for fingerprints and derived identifiers.
 */
export function shortHash(content: string, length = 16): string {
  return createHash('sha256').update(content).digest('hex').slice(0, length);
}

/**
 * Fingerprint of a set of (id, marker) pairs, independent of their order.
 */
export function fingerprintOf(parts: Array<[id: string, marker: string]>): string {
  const canonical = parts
    .map(([id, marker]) => `${id}=${marker}`)
    .sort()
    .join('\n');
  return shortHash(canonical);
}
