/**
 * Average-hash fingerprints for near-duplicate detection
 *
 * The image is reduced to a tiny grayscale grid and each cell is compared
 * against the grid's own mean luminance. Only coarse structure survives, so
 * recompression, mild resizing and small colour shifts leave most bits intact.
 *
 * Not robust to rotation or cropping.
 */

import sharp from 'sharp';

import { InvalidOptionsError } from '../lib/errors.js';
import type { Bit, Fingerprint } from '../types/index.js';

/**
 * Default grid side; 8 gives 64-bit fingerprints
 */
export const DEFAULT_HASH_SIZE = 8;

export function assertHashSize(hashSize: number): void {
  if (!Number.isInteger(hashSize) || hashSize < 2) {
    throw new InvalidOptionsError(`hashSize must be an integer >= 2, got ${hashSize}`);
  }
}

/**
 * Compute the average-hash fingerprint of an encoded image
 *
 * @param image - Encoded image data (any format sharp can read)
 * @param hashSize - Side of the sampling grid
 * @returns Frozen bit sequence of length `hashSize * hashSize`
 */
export async function computeFingerprint(
  image: Buffer,
  hashSize: number = DEFAULT_HASH_SIZE
): Promise<Fingerprint> {
  assertHashSize(hashSize);

  const { data, info } = await sharp(image, { failOn: 'truncated' })
    .removeAlpha()
    .grayscale()
    .resize(hashSize, hashSize, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const cells = hashSize * hashSize;
  const stride = info.channels;
  if (data.length !== cells * stride) {
    throw new Error(`Unexpected raw buffer size ${data.length} for ${hashSize}x${hashSize} grid`);
  }

  const luminance = new Array<number>(cells);
  for (let i = 0; i < cells; i++) {
    luminance[i] = data[i * stride];
  }

  return averageHash(luminance);
}

/**
 * Threshold a row-major luminance grid against its floating-point mean.
 * Cells equal to the mean map to 1.
 */
export function averageHash(luminance: readonly number[]): Fingerprint {
  if (luminance.length === 0) {
    throw new Error('Cannot hash an empty luminance grid');
  }

  const mean = luminance.reduce((sum, value) => sum + value, 0) / luminance.length;
  const bits = luminance.map((value): Bit => (value >= mean ? 1 : 0));

  return Object.freeze(bits);
}

/**
 * Hex rendering of a fingerprint for logs and reports. The bit string is
 * zero-padded on the right to a whole number of nibbles.
 */
export function fingerprintToHex(fingerprint: Fingerprint): string {
  let hex = '';
  for (let i = 0; i < fingerprint.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) {
      nibble = (nibble << 1) | (fingerprint[i + j] ?? 0);
    }
    hex += nibble.toString(16);
  }
  return hex;
}

/**
 * Inverse of {@link fingerprintToHex}
 */
export function fingerprintFromHex(hex: string, bitLength: number = hex.length * 4): Fingerprint {
  if (!/^[0-9a-f]*$/i.test(hex)) {
    throw new Error(`Invalid fingerprint hex: ${hex}`);
  }
  if (bitLength > hex.length * 4 || bitLength <= (hex.length - 1) * 4) {
    throw new Error(`Hex of ${hex.length} digits cannot hold ${bitLength} bits`);
  }

  const bits: Bit[] = [];
  for (const char of hex) {
    const nibble = parseInt(char, 16);
    for (let shift = 3; shift >= 0; shift--) {
      bits.push(((nibble >> shift) & 1) === 1 ? 1 : 0);
    }
  }

  return Object.freeze(bits.slice(0, bitLength));
}
