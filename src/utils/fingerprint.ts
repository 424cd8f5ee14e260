/**
 * Deterministic SHA256 fingerprints for cache keys.
 *
 * Parameters are canonicalized (sorted keys, undefined dropped) so the same
 * inputs always hash to the same key regardless of property order.
 */

import { createHash } from 'node:crypto';

export type FingerprintValue = string | number | boolean | null | undefined | FingerprintValue[];

export function sha256(payload: string): string {
  return createHash('sha256').update(payload).digest('hex');
}

/**
 * Hash every parameter that affects an artifact's content.
 *
 * @example
 * ```typescript
 * fingerprint({ chunkSize: 1000, chunkOverlap: 200, textHash })
 * ```
 */
export function fingerprint(params: Record<string, FingerprintValue>): string {
  const canonical: Record<string, FingerprintValue> = {};
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value !== undefined) {
      canonical[key] = value;
    }
  }
  return sha256(JSON.stringify(canonical));
}
