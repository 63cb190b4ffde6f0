import { describe, it, expect } from 'vitest';
import { computeFingerprint, isFingerprint } from '@/lib/fingerprint.js';

describe('computeFingerprint', () => {
  it('should default to md5 hex', () => {
    expect(computeFingerprint('abc')).toBe('900150983cd24fb0d6963f7d28e17f72');
  });

  it('should support sha256', () => {
    expect(computeFingerprint('abc', 'sha256')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('should fingerprint empty output', () => {
    expect(computeFingerprint('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });

  it('should be stable for identical text and differ for changed text', () => {
    const before = 'TITLE,OpenVPN 2.6\nUpdated,2026-10-18 12:00:00\nEND\n';
    const after = 'TITLE,OpenVPN 2.6\nUpdated,2026-10-18 12:00:30\nEND\n';

    expect(computeFingerprint(before)).toBe(computeFingerprint(before));
    expect(computeFingerprint(before)).not.toBe(computeFingerprint(after));
  });

  it('should not normalize whitespace', () => {
    expect(computeFingerprint('END\n')).not.toBe(computeFingerprint('END\r\n'));
  });
});

describe('isFingerprint', () => {
  it('should accept digests of the matching length', () => {
    expect(isFingerprint('900150983cd24fb0d6963f7d28e17f72', 'md5')).toBe(true);
    expect(isFingerprint(computeFingerprint('x', 'sha256'), 'sha256')).toBe(true);
  });

  it('should reject a digest of the other algorithm', () => {
    expect(isFingerprint('900150983cd24fb0d6963f7d28e17f72', 'sha256')).toBe(false);
  });

  it('should reject uppercase, non-hex and non-string values', () => {
    expect(isFingerprint('900150983CD24FB0D6963F7D28E17F72', 'md5')).toBe(false);
    expect(isFingerprint('z00150983cd24fb0d6963f7d28e17f72', 'md5')).toBe(false);
    expect(isFingerprint(42, 'md5')).toBe(false);
  });
});
