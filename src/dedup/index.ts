/**
 * Dedup module - Classifier, decoding collaborator and orchestration
 */

export { DuplicateClassifier, DEFAULT_DISTANCE_THRESHOLD } from './classifier.js';
export { decodeSource, type ImageSource, type DecodeOptions } from './decoder.js';
export {
  DedupOptionsSchema,
  resolveDedupOptions,
  type DedupOptions,
  type DedupOptionsInput
} from './options.js';
export { classifyRecords, dedupeImages, type ClassifyOptions } from './orchestrator.js';
