/**
 * Decoding collaborator
 *
 * Turns an image source into an ImageRecord carrying either a fingerprint or a
 * tagged skip reason. Nothing thrown here reaches the classifier.
 */

import { computeFingerprint } from '../hash/fingerprint.js';
import { toError } from '../lib/errors.js';
import type { ImageRecord, SkipReason } from '../types/index.js';

/**
 * One input item before decoding
 */
export interface ImageSource {
  /** Stable identifier, e.g. the path inside the archive */
  id: string;
  /** Byte size of the encoded payload */
  size: number;
  load: () => Promise<Buffer>;
}

export interface DecodeOptions {
  hashSize: number;
  maxImageSize: number;
  itemTimeoutMs: number;
}

class ItemTimeoutError extends Error {
  constructor(ms: number) {
    super(`Fingerprinting exceeded ${ms}ms`);
    this.name = 'ItemTimeoutError';
  }
}

// The underlying work is not cancelled; the pipeline just stops waiting for it.
async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ItemTimeoutError(ms)), ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function skip(source: ImageSource, reason: SkipReason): ImageRecord {
  return { id: source.id, size: source.size, outcome: { ok: false, reason } };
}

export async function decodeSource(source: ImageSource, options: DecodeOptions): Promise<ImageRecord> {
  if (source.size > options.maxImageSize) {
    return skip(source, {
      code: 'oversize',
      message: `File too large (${source.size} bytes, limit ${options.maxImageSize})`
    });
  }

  try {
    const fingerprint = await withTimeout(
      source.load().then(buffer => computeFingerprint(buffer, options.hashSize)),
      options.itemTimeoutMs
    );
    return { id: source.id, size: source.size, outcome: { ok: true, fingerprint } };
  } catch (error) {
    if (error instanceof ItemTimeoutError) {
      return skip(source, { code: 'timeout', message: error.message });
    }
    return skip(source, {
      code: 'decode_failed',
      message: `Invalid or corrupted image - ${toError(error).message}`
    });
  }
}
