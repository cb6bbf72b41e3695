/**
 * Stream orchestrator
 *
 * Fingerprinting is parallel; classification is not. Records are fed to the
 * classifier strictly in encounter order so representative selection does not
 * depend on which decode finished first.
 */

import { DuplicateClassifier } from './classifier.js';
import { decodeSource, type ImageSource } from './decoder.js';
import { resolveDedupOptions, type DedupOptionsInput } from './options.js';
import { fingerprintToHex } from '../hash/fingerprint.js';
import { ExtractorFailureError } from '../lib/errors.js';
import { createRunLogger, logger, type Logger } from '../lib/logger.js';
import { runWorkerPool } from '../lib/worker-pool.js';
import type { DedupReport, ImageRecord, VerdictEntry } from '../types/index.js';

export interface ClassifyOptions {
  threshold?: number;
  log?: Logger;
}

/**
 * Classify already-decoded records in order
 *
 * @throws FingerprintLengthMismatchError on mixed fingerprint lengths
 * @throws ExtractorFailureError when two or more records were decoded and all failed
 */
export function classifyRecords(
  records: Iterable<ImageRecord>,
  options: ClassifyOptions = {}
): DedupReport {
  const log = options.log ?? logger;
  const classifier = new DuplicateClassifier(options.threshold);
  const verdicts: VerdictEntry[] = [];

  let attempted = 0;
  let fingerprinted = 0;
  let firstFailure: string | undefined;

  for (const record of records) {
    const { outcome } = record;

    if (!outcome.ok) {
      if (outcome.reason.code !== 'oversize') {
        attempted++;
        firstFailure ??= outcome.reason.message;
      }
      log.warn({ id: record.id, reason: outcome.reason }, 'Skipping image');
      verdicts.push({ id: record.id, kind: 'skipped', reason: outcome.reason });
      continue;
    }

    attempted++;
    fingerprinted++;
    const verdict = classifier.classify(record.id, outcome.fingerprint);
    if (verdict.kind === 'duplicate') {
      log.debug(
        {
          id: record.id,
          representative: verdict.representative,
          distance: verdict.distance,
          fingerprint: fingerprintToHex(outcome.fingerprint)
        },
        'Near-duplicate found'
      );
    }
    verdicts.push({ id: record.id, ...verdict });
  }

  if (attempted >= 2 && fingerprinted === 0) {
    throw new ExtractorFailureError(attempted, firstFailure ?? 'unknown');
  }

  return buildReport(verdicts, classifier);
}

function buildReport(verdicts: VerdictEntry[], classifier: DuplicateClassifier): DedupReport {
  const unique: string[] = [];
  const duplicates: DedupReport['duplicates'] = [];
  const skipped: DedupReport['skipped'] = [];

  for (const verdict of verdicts) {
    switch (verdict.kind) {
      case 'unique':
        unique.push(verdict.id);
        break;
      case 'duplicate':
        duplicates.push({ id: verdict.id, representative: verdict.representative });
        break;
      case 'skipped':
        skipped.push({ id: verdict.id, reason: verdict.reason });
        break;
    }
  }

  return {
    verdicts,
    unique,
    duplicates,
    skipped,
    accepted: classifier.acceptedSet,
    counts: {
      total: verdicts.length,
      unique: unique.length,
      duplicate: duplicates.length,
      skipped: skipped.length
    }
  };
}

/**
 * Decode, fingerprint and classify a batch of image sources
 *
 * @param sources - Images in encounter order
 * @param input - Per-run options; unset values come from the environment
 * @param parentLog - Logger the run's child logger derives from
 */
export async function dedupeImages(
  sources: readonly ImageSource[],
  input: DedupOptionsInput = {},
  parentLog: Logger = logger
): Promise<DedupReport> {
  const options = resolveDedupOptions(input);
  const { log } = createRunLogger(parentLog);

  log.info(
    { images: sources.length, hashSize: options.hashSize, threshold: options.threshold },
    'Starting dedup run'
  );

  const decoded = await runWorkerPool(sources, source => decodeSource(source, options), {
    concurrency: options.concurrency
  });

  // decodeSource reports failures as values; a rejection here is a bug
  const records = decoded.map(result => {
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  });

  const report = classifyRecords(records, { threshold: options.threshold, log });

  log.info(report.counts, 'Dedup run complete');
  return report;
}
