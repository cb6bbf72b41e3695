import { FingerprintLengthMismatchError } from '../lib/errors.js';
import type { Fingerprint } from '../types/index.js';

/**
 * Calculate Hamming distance between two fingerprints
 *
 * @returns Number of differing bit positions (0 = identical)
 * @throws FingerprintLengthMismatchError when the lengths differ
 */
export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
  if (a.length !== b.length) {
    throw new FingerprintLengthMismatchError(a.length, b.length);
  }

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      distance++;
    }
  }

  return distance;
}

