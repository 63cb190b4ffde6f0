/**
 * Fingerprint store types.
 *
 * The state record is the only value carried from one tick to the next.
 */

import type { HashAlgorithm } from './config.js';
import type { Verdict } from './report.js';

/** Current on-disk format of the state record */
export const STATE_RECORD_VERSION = 1;

/**
 * Persisted state record.
 */
export interface StateRecord {
  /** Format version */
  version: typeof STATE_RECORD_VERSION;
  /** Hex digest of the last completed status probe */
  fingerprint: string;
  /** Digest that produced `fingerprint` */
  algorithm: HashAlgorithm;
  /** ISO timestamp of the tick that wrote this record */
  updated_at: string;
  /** Verdict of the tick that wrote this record */
  last_verdict: Verdict;
}
