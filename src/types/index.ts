// Core type definitions for the near-duplicate image filter

export type Bit = 0 | 1;

/**
 * Row-major bit grid of side `hashSize`, frozen once produced.
 */
export type Fingerprint = readonly Bit[];

export type SkipCode = 'oversize' | 'decode_failed' | 'timeout';

export interface SkipReason {
  code: SkipCode;
  message: string;
}

export type FingerprintOutcome =
  | { ok: true; fingerprint: Fingerprint }
  | { ok: false; reason: SkipReason };

/**
 * One input item after the decoding collaborator has looked at it.
 */
export interface ImageRecord {
  id: string;
  size: number;
  outcome: FingerprintOutcome;
}

export interface AcceptedEntry {
  fingerprint: Fingerprint;
  representative: string;
}

export type ClassifiedVerdict =
  | { kind: 'unique' }
  | { kind: 'duplicate'; representative: string; distance: number };

export type Verdict = ClassifiedVerdict | { kind: 'skipped'; reason: SkipReason };

export type VerdictEntry = { id: string } & Verdict;

export interface DedupCounts {
  total: number;
  unique: number;
  duplicate: number;
  skipped: number;
}

export interface DedupReport {
  verdicts: VerdictEntry[];
  unique: string[];
  duplicates: Array<{ id: string; representative: string }>;
  skipped: Array<{ id: string; reason: SkipReason }>;
  accepted: readonly AcceptedEntry[];
  counts: DedupCounts;
}
