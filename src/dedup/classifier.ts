/**
 * Incremental duplicate classifier
 *
 * Holds the accepted set for one run. Each incoming fingerprint is compared
 * against accepted members in insertion order and the first member within the
 * threshold becomes its representative. This is first-match, not
 * nearest-match: with A~B, B~C and A!~C, order A,B,C maps both B and C to A
 * while order C,B,A maps both to C.
 */

import { hammingDistance } from '../hash/distance.js';
import { InvalidOptionsError } from '../lib/errors.js';
import type { AcceptedEntry, ClassifiedVerdict, Fingerprint } from '../types/index.js';

/**
 * Default similarity threshold (Hamming distance, inclusive)
 */
export const DEFAULT_DISTANCE_THRESHOLD = 5;

export class DuplicateClassifier {
  private readonly entries: AcceptedEntry[] = [];
  readonly threshold: number;

  constructor(threshold: number = DEFAULT_DISTANCE_THRESHOLD) {
    if (!Number.isInteger(threshold) || threshold < 0) {
      throw new InvalidOptionsError(`threshold must be a non-negative integer, got ${threshold}`);
    }
    this.threshold = threshold;
  }

  /**
   * Classify a fingerprint, admitting it to the accepted set when unique
   *
   * @param id - Identifier recorded as representative if the item is unique
   * @param fingerprint - Fingerprint of the item
   * @throws FingerprintLengthMismatchError when lengths differ from accepted members
   */
  public classify(id: string, fingerprint: Fingerprint): ClassifiedVerdict {
    for (const entry of this.entries) {
      const distance = hammingDistance(fingerprint, entry.fingerprint);
      if (distance <= this.threshold) {
        return { kind: 'duplicate', representative: entry.representative, distance };
      }
    }

    this.entries.push({ fingerprint, representative: id });
    return { kind: 'unique' };
  }

  public get acceptedSet(): readonly AcceptedEntry[] {
    return this.entries.slice();
  }

  public get size(): number {
    return this.entries.length;
  }
}
