import { pino } from 'pino';
import { describe, it, expect, vi } from 'vitest';

import type { ImageSource } from '../../src/dedup/decoder.js';
import { classifyRecords, dedupeImages } from '../../src/dedup/orchestrator.js';
import { fingerprintFromHex } from '../../src/hash/fingerprint.js';
import { ExtractorFailureError, FingerprintLengthMismatchError } from '../../src/lib/errors.js';
import { logger } from '../../src/lib/logger.js';
import type { ImageRecord } from '../../src/types/index.js';
import {
  BLUE,
  CORRUPT_IMAGE,
  RED,
  createSquareImage,
  resaveAsJpeg
} from '../helpers/test-images.js';

function fingerprinted(id: string, hex: string): ImageRecord {
  return { id, size: 100, outcome: { ok: true, fingerprint: fingerprintFromHex(hex) } };
}

function failed(id: string, code: 'oversize' | 'decode_failed' | 'timeout' = 'decode_failed'): ImageRecord {
  return { id, size: 100, outcome: { ok: false, reason: { code, message: `${code} ${id}` } } };
}

function source(id: string, image: Buffer, delayMs = 0): ImageSource {
  return {
    id,
    size: image.length,
    load: () => new Promise<Buffer>(resolve => setTimeout(() => resolve(image), delayMs))
  };
}

describe('classifyRecords', () => {
  it('partitions records into unique, duplicate and skipped in encounter order', () => {
    const report = classifyRecords(
      [
        fingerprinted('a.png', '0000000000000000'),
        failed('broken.png'),
        fingerprinted('a-copy.jpg', '8000000000000000'),
        fingerprinted('b.png', 'ffffffffffffffff')
      ],
      { threshold: 5 }
    );

    expect(report.verdicts).toEqual([
      { id: 'a.png', kind: 'unique' },
      {
        id: 'broken.png',
        kind: 'skipped',
        reason: { code: 'decode_failed', message: 'decode_failed broken.png' }
      },
      { id: 'a-copy.jpg', kind: 'duplicate', representative: 'a.png', distance: 1 },
      { id: 'b.png', kind: 'unique' }
    ]);
    expect(report.unique).toEqual(['a.png', 'b.png']);
    expect(report.duplicates).toEqual([{ id: 'a-copy.jpg', representative: 'a.png' }]);
    expect(report.skipped.map(entry => entry.id)).toEqual(['broken.png']);
    expect(report.accepted.map(entry => entry.representative)).toEqual(['a.png', 'b.png']);
    expect(report.counts).toEqual({ total: 4, unique: 2, duplicate: 1, skipped: 1 });
  });

  it('logs the hex fingerprint of each near-duplicate', () => {
    const log = logger.child({});
    const debug = vi.spyOn(log, 'debug');

    classifyRecords(
      [fingerprinted('a.png', '0000000000000000'), fingerprinted('a-copy.jpg', '8000000000000000')],
      { threshold: 5, log }
    );

    expect(debug).toHaveBeenCalledWith(
      { id: 'a-copy.jpg', representative: 'a.png', distance: 1, fingerprint: '8000000000000000' },
      'Near-duplicate found'
    );
  });

  it('never lets a skipped record influence later classification', () => {
    const withFailure = classifyRecords([failed('x'), fingerprinted('a', 'ff00ff00ff00ff00')]);
    const without = classifyRecords([fingerprinted('a', 'ff00ff00ff00ff00')]);

    expect(withFailure.accepted).toEqual(without.accepted);
    expect(withFailure.verdicts[1]).toEqual({ id: 'a', kind: 'unique' });
  });

  it('is deterministic for the same ordered input', () => {
    const records = [
      fingerprinted('a', '0000000000000000'),
      fingerprinted('b', '0300000000000000'),
      fingerprinted('c', 'fffffffffffffff0'),
      fingerprinted('d', 'ffffffffffffffff')
    ];

    expect(classifyRecords(records).verdicts).toEqual(classifyRecords(records).verdicts);
  });

  it('aborts when every attempted decode failed', () => {
    expect(() => classifyRecords([failed('a'), failed('b', 'timeout')])).toThrow(ExtractorFailureError);
  });

  it('does not count oversize skips as extractor failures', () => {
    const report = classifyRecords([failed('big-1', 'oversize'), failed('big-2', 'oversize')]);

    expect(report.counts).toEqual({ total: 2, unique: 0, duplicate: 0, skipped: 2 });
  });

  it('reports a lone corrupt image as skipped', () => {
    const report = classifyRecords([failed('only.png')]);

    expect(report.counts.skipped).toBe(1);
  });

  it('aborts on mixed fingerprint lengths', () => {
    expect(() =>
      classifyRecords([fingerprinted('a', '0000000000000000'), fingerprinted('b', '0000')])
    ).toThrow(FingerprintLengthMismatchError);
  });
});

describe('dedupeImages', () => {
  it('keeps one image per cluster for a recompressed copy and a distinct image', async () => {
    const blue = await createSquareImage(BLUE, 'top-left');
    const blueResaved = await resaveAsJpeg(blue, 90);
    const red = await createSquareImage(RED, 'bottom-right');

    const report = await dedupeImages(
      [source('img1.png', blue), source('img2.jpg', blueResaved), source('img3.png', red)],
      { threshold: 5 }
    );

    expect(report.verdicts.map(({ id, kind }) => ({ id, kind }))).toEqual([
      { id: 'img1.png', kind: 'unique' },
      { id: 'img2.jpg', kind: 'duplicate' },
      { id: 'img3.png', kind: 'unique' }
    ]);
    expect(report.duplicates).toEqual([{ id: 'img2.jpg', representative: 'img1.png' }]);
    expect(report.accepted).toHaveLength(2);
  });

  it('classifies in input order even when decodes finish out of order', async () => {
    const blue = await createSquareImage(BLUE, 'top-left');

    const report = await dedupeImages(
      [source('slow.png', blue, 60), source('fast.png', blue, 0)],
      { concurrency: 2 }
    );

    expect(report.unique).toEqual(['slow.png']);
    expect(report.duplicates).toEqual([{ id: 'fast.png', representative: 'slow.png' }]);
  });

  it('skips a corrupted file without affecting the rest', async () => {
    const blue = await createSquareImage(BLUE);
    const red = await createSquareImage(RED, 'bottom-right');

    const report = await dedupeImages([
      source('a.png', blue),
      source('broken.png', CORRUPT_IMAGE),
      source('b.png', red)
    ]);

    expect(report.unique).toEqual(['a.png', 'b.png']);
    expect(report.skipped).toHaveLength(1);
    expect(report.skipped[0].id).toBe('broken.png');
    expect(report.skipped[0].reason.code).toBe('decode_failed');
    expect(report.accepted.map(entry => entry.representative)).toEqual(['a.png', 'b.png']);
  });

  it('skips oversize images without loading them', async () => {
    const load = vi.fn(async () => createSquareImage(BLUE));
    const blue = await createSquareImage(BLUE);

    const report = await dedupeImages(
      [source('ok.png', blue), { id: 'huge.png', size: 10_000, load }],
      { maxImageSize: 5_000 }
    );

    expect(load).not.toHaveBeenCalled();
    expect(report.skipped).toEqual([
      {
        id: 'huge.png',
        reason: { code: 'oversize', message: 'File too large (10000 bytes, limit 5000)' }
      }
    ]);
  });

  it('turns a hung decode into a timeout skip', async () => {
    const blue = await createSquareImage(BLUE);
    const hung: ImageSource = { id: 'hung.png', size: 10, load: () => new Promise<Buffer>(() => undefined) };

    const report = await dedupeImages([source('ok.png', blue), hung], { itemTimeoutMs: 500 });

    expect(report.skipped).toEqual([
      { id: 'hung.png', reason: { code: 'timeout', message: 'Fingerprinting exceeded 500ms' } }
    ]);
    expect(report.unique).toEqual(['ok.png']);
  });

  it('writes the run id once on the completion line', async () => {
    const lines: string[] = [];
    const parent = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
    const blue = await createSquareImage(BLUE);

    await dedupeImages([source('a.png', blue)], {}, parent);

    const complete = lines.find(line => line.includes('"msg":"Dedup run complete"'));
    expect(complete?.match(/"runId"/g)).toHaveLength(1);
    expect(JSON.parse(complete ?? '{}')).toMatchObject({ total: 1, unique: 1, duplicate: 0, skipped: 0 });
  });

  it('rejects invalid options before touching any source', async () => {
    const load = vi.fn(async () => CORRUPT_IMAGE);

    await expect(dedupeImages([{ id: 'a', size: 1, load }], { threshold: -1 })).rejects.toThrow(
      'Invalid dedup options'
    );
    expect(load).not.toHaveBeenCalled();
  });
});
