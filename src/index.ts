export * from './types/index.js';
export * from './hash/index.js';
export * from './dedup/index.js';
export * from './archive/index.js';
export { withWorkspace } from './storage/index.js';
export {
  dedupeArchive,
  OUTPUT_ARCHIVE_NAME,
  type DedupeArchiveOptions,
  type DedupeArchiveResult
} from './services/archive-dedup.js';
export {
  DedupError,
  FingerprintLengthMismatchError,
  ExtractorFailureError,
  ArchiveValidationError,
  InvalidOptionsError,
  type DedupErrorCode,
  type ArchiveFailure
} from './lib/errors.js';
export { logger, createRunLogger } from './lib/logger.js';
export { env } from './config/index.js';
