/**
 * Probe output fingerprinting.
 *
 * A live OpenVPN server's `status` output changes between ticks (byte
 * counters, the `Updated` timestamp), so two identical fingerprints in a row
 * mean the management thread is stuck.
 */

import { createHash } from 'node:crypto';
import type { HashAlgorithm } from '../types/config.js';

/** Hex digest length per algorithm */
export const FINGERPRINT_LENGTH: Readonly<Record<HashAlgorithm, number>> = {
  md5: 32,
  sha256: 64,
};

/**
 * Computes the fingerprint of a probe response.
 *
 * The text is hashed byte-for-byte as UTF-8; no normalization is applied.
 *
 * @returns Lowercase hexadecimal digest
 */
export function computeFingerprint(text: string, algorithm: HashAlgorithm = 'md5'): string {
  const hash = createHash(algorithm);
  hash.update(text, 'utf8');
  return hash.digest('hex');
}

/**
 * Checks that a stored value looks like a digest of the given algorithm.
 */
export function isFingerprint(value: unknown, algorithm: HashAlgorithm): value is string {
  return (
    typeof value === 'string' &&
    value.length === FINGERPRINT_LENGTH[algorithm] &&
    /^[0-9a-f]+$/.test(value)
  );
}
