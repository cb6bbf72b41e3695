/**
 * Zip archive collaborator
 *
 * Validates an input archive before anything is decoded, exposes its image
 * entries as ImageSources and packs the survivors into an output archive.
 * All reads go through jszip in memory; nothing is extracted to disk.
 */

import { readFile, stat, writeFile } from 'node:fs/promises';
import { extname, posix } from 'node:path';

import JSZip from 'jszip';

import type { ImageSource } from '../dedup/decoder.js';
import { ArchiveValidationError, toError } from '../lib/errors.js';
import { logger, type Logger } from '../lib/logger.js';

export const VALID_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.bmp',
  '.gif',
  '.tif',
  '.tiff',
  '.webp'
]);

export interface ArchiveLimits {
  /** Maximum compressed archive size in bytes */
  maxArchiveSize: number;
  /** Uncompressed total may not exceed maxArchiveSize * maxCompressionRatio */
  maxCompressionRatio: number;
}

export interface ValidatedArchive {
  zip: JSZip;
  /** Compressed size on disk */
  size: number;
  /** Uncompressed size of each file entry, keyed by entry name */
  entrySizes: ReadonlyMap<string, number>;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Check existence, size, integrity and compression ratio of a zip archive
 *
 * @throws ArchiveValidationError describing the first check that failed
 */
export async function validateArchive(path: string, limits: ArchiveLimits): Promise<ValidatedArchive> {
  let size: number;
  try {
    size = (await stat(path)).size;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new ArchiveValidationError('not_found', `Input zip file not found: ${path}`);
    }
    throw error;
  }

  if (size > limits.maxArchiveSize) {
    throw new ArchiveValidationError(
      'too_large',
      `ZIP file too large (${size} bytes). Maximum allowed: ${limits.maxArchiveSize} bytes`
    );
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await readFile(path), { checkCRC32: true });
  } catch (error) {
    throw new ArchiveValidationError('corrupt', 'File is not a valid ZIP archive', {
      cause: error
    });
  }

  const entrySizes = await measureEntries(zip, limits.maxArchiveSize * limits.maxCompressionRatio);

  return { zip, size, entrySizes };
}

/**
 * Decompress one entry without keeping it, resolving to its byte count.
 * Rejects once `budget` bytes have been produced.
 */
function countEntryBytes(entry: JSZip.JSZipObject, budget: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const stream = entry.nodeStream('nodebuffer');
    let count = 0;

    stream.on('data', (chunk: Buffer) => {
      count += chunk.length;
      if (count > budget) {
        stream.pause();
        stream.removeAllListeners('data');
        stream.removeAllListeners('end');
        reject(
          new ArchiveValidationError(
            'suspicious_ratio',
            'Suspicious ZIP file detected (possible zip bomb)'
          )
        );
      }
    });
    stream.on('end', () => resolve(count));
    stream.on('error', (error: unknown) => {
      reject(
        new ArchiveValidationError(
          'corrupt',
          `ZIP file is corrupted (${entry.name}: ${toError(error).message})`,
          { cause: error }
        )
      );
    });
  });
}

/**
 * Decompress every entry once to learn its uncompressed size, stopping as soon
 * as the running total passes the cap.
 */
async function measureEntries(zip: JSZip, maxTotal: number): Promise<Map<string, number>> {
  const sizes = new Map<string, number>();
  let total = 0;

  for (const entry of Object.values(zip.files)) {
    if (entry.dir) {
      continue;
    }

    const entrySize = await countEntryBytes(entry, maxTotal - total);
    total += entrySize;
    sizes.set(entry.name, entrySize);
  }

  return sizes;
}

/**
 * Normalise an entry name, returning null for names that would escape the
 * archive root.
 */
export function safeEntryPath(name: string): string | null {
  const normalized = posix.normalize(name.replace(/\\/g, '/'));
  if (
    normalized.startsWith('/') ||
    normalized === '..' ||
    normalized.startsWith('../') ||
    /^[a-zA-Z]:/.test(normalized)
  ) {
    return null;
  }
  return normalized;
}

export function isImageEntry(name: string): boolean {
  return VALID_EXTENSIONS.has(extname(name).toLowerCase());
}

/**
 * Image entries keyed by id, in archive order. When two entry names normalise
 * to the same id, the first one wins and `onAlias` sees the later one.
 */
function indexImageEntries(
  archive: ValidatedArchive,
  onAlias?: (id: string, entry: JSZip.JSZipObject) => void
): Map<string, JSZip.JSZipObject> {
  const byId = new Map<string, JSZip.JSZipObject>();

  for (const entry of Object.values(archive.zip.files)) {
    if (entry.dir || !isImageEntry(entry.name)) {
      continue;
    }

    const id = safeEntryPath(entry.name);
    if (id === null) {
      continue;
    }
    if (byId.has(id)) {
      onAlias?.(id, entry);
      continue;
    }

    byId.set(id, entry);
  }

  return byId;
}

/**
 * Image entries of a validated archive, in archive order
 */
export function listImageEntries(archive: ValidatedArchive, log: Logger = logger): ImageSource[] {
  const entries = indexImageEntries(archive, (id, entry) => {
    log.warn({ id, entry: entry.name }, 'Skipping archive entry that duplicates an earlier path');
  });

  return Array.from(entries, ([id, entry]) => ({
    id,
    size: archive.entrySizes.get(entry.name) ?? 0,
    load: () => entry.async('nodebuffer')
  }));
}

/**
 * Write the selected entries, at their original relative paths, to a new
 * deflate-compressed archive
 *
 * @param archive - Source archive
 * @param ids - Entry ids as returned by {@link listImageEntries}
 * @param outputPath - Destination file
 * @returns Number of entries written
 */
export async function writeUniqueArchive(
  archive: ValidatedArchive,
  ids: readonly string[],
  outputPath: string
): Promise<number> {
  const byId = indexImageEntries(archive);

  const output = new JSZip();
  for (const id of ids) {
    const entry = byId.get(id);
    if (!entry) {
      throw new Error(`Archive entry not found: ${id}`);
    }
    output.file(id, await entry.async('nodebuffer'), { date: entry.date });
  }

  const buffer = await output.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 }
  });
  await writeFile(outputPath, buffer);

  return ids.length;
}
