/**
 * Archive module - Zip validation, image listing and repackaging
 */

export {
  validateArchive,
  listImageEntries,
  writeUniqueArchive,
  safeEntryPath,
  isImageEntry,
  VALID_EXTENSIONS,
  type ArchiveLimits,
  type ValidatedArchive
} from './zip.js';
