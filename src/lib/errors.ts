/**
 * Structural errors. These abort a run; per-item failures are carried as
 * values on ImageRecord instead.
 */

export type DedupErrorCode =
  | 'fingerprint_length_mismatch'
  | 'extractor_failure'
  | 'archive_invalid'
  | 'invalid_options';

export class DedupError extends Error {
  readonly code: DedupErrorCode;

  constructor(code: DedupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DedupError';
    this.code = code;
  }
}

export class FingerprintLengthMismatchError extends DedupError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      'fingerprint_length_mismatch',
      `Fingerprint lengths must match (expected ${expected} bits, got ${actual})`
    );
    this.name = 'FingerprintLengthMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ExtractorFailureError extends DedupError {
  readonly attempted: number;

  constructor(attempted: number, firstReason: string) {
    super(
      'extractor_failure',
      `Fingerprinting failed for all ${attempted} decoded images (first failure: ${firstReason})`
    );
    this.name = 'ExtractorFailureError';
    this.attempted = attempted;
  }
}

export type ArchiveFailure = 'not_found' | 'too_large' | 'corrupt' | 'suspicious_ratio';

export class ArchiveValidationError extends DedupError {
  readonly reason: ArchiveFailure;

  constructor(reason: ArchiveFailure, message: string, options?: { cause?: unknown }) {
    super('archive_invalid', message, options);
    this.name = 'ArchiveValidationError';
    this.reason = reason;
  }
}

export class InvalidOptionsError extends DedupError {
  constructor(message: string) {
    super('invalid_options', message);
    this.name = 'InvalidOptionsError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
