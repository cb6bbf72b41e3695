/**
 * Archive Dedup Service
 * Validates an image archive, keeps one image per near-duplicate cluster and
 * writes the survivors to `unique_images.zip`
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { listImageEntries, validateArchive, writeUniqueArchive } from '../archive/index.js';
import { env } from '../config/index.js';
import { dedupeImages, type DedupOptionsInput } from '../dedup/index.js';
import { logger } from '../lib/logger.js';
import { withWorkspace } from '../storage/index.js';
import type { DedupReport } from '../types/index.js';

export const OUTPUT_ARCHIVE_NAME = 'unique_images.zip';

export interface DedupeArchiveOptions extends DedupOptionsInput {
  inputPath: string;
  outputDir: string;
  maxArchiveSize?: number;
  maxCompressionRatio?: number;
}

export interface DedupeArchiveResult {
  report: DedupReport;
  outputPath: string;
}

/**
 * Run the full archive pipeline
 *
 * The output archive is staged in a private workspace and only copied into
 * `outputDir` once the run has succeeded.
 */
export async function dedupeArchive(options: DedupeArchiveOptions): Promise<DedupeArchiveResult> {
  const { inputPath, outputDir, maxArchiveSize, maxCompressionRatio, ...dedupOptions } = options;

  logger.info({ inputPath, outputDir }, 'Starting archive dedup');

  try {
    const archive = await validateArchive(inputPath, {
      maxArchiveSize: maxArchiveSize ?? env.MAX_ZIP_SIZE,
      maxCompressionRatio: maxCompressionRatio ?? env.MAX_COMPRESSION_RATIO
    });

    const sources = listImageEntries(archive);
    logger.info({ images: sources.length }, 'Found image files');

    const report = await dedupeImages(sources, dedupOptions);

    logger.info(
      { unique: report.counts.unique, duplicates: report.counts.duplicate, skipped: report.counts.skipped },
      'Classification finished'
    );

    const outputPath = join(outputDir, OUTPUT_ARCHIVE_NAME);
    await withWorkspace('imgdedup-', async workspace => {
      const staged = join(workspace, OUTPUT_ARCHIVE_NAME);
      await writeUniqueArchive(archive, report.unique, staged);
      await mkdir(outputDir, { recursive: true });
      await copyFile(staged, outputPath);
    });

    logger.info({ outputPath }, 'Unique images archived');

    return { report, outputPath };
  } catch (error) {
    logger.error({ error, inputPath }, 'Archive dedup failed');
    throw error;
  }
}
