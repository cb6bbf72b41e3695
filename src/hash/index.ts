/**
 * Hash module - Average-hash fingerprints and Hamming distance
 */

export {
  computeFingerprint,
  averageHash,
  assertHashSize,
  fingerprintToHex,
  fingerprintFromHex,
  DEFAULT_HASH_SIZE
} from './fingerprint.js';
export { hammingDistance } from './distance.js';
