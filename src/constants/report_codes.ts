/**
 * Single source of truth for report codes.
 *
 * FIRST_RUN / STATUS_CHANGED: tick passed
 * STATUS_UNCHANGED / PROBE_*: service judged frozen or unreachable
 * BLOCKED_*: tick aborted before touching state
 */
export const REPORT_CODES = [
  'FIRST_RUN',
  'STATUS_CHANGED',
  'STATUS_UNCHANGED',
  'PROBE_UNREACHABLE',
  'PROBE_TIMEOUT',
  'BLOCKED_LOCK_HELD',
  'BLOCKED_LOCK_CORRUPT',
] as const;

/**
 * Type derived from the const array.
 */
export type ReportCode = typeof REPORT_CODES[number];

/**
 * One-line explanation per code, printed by the CLI summary.
 */
export const REPORT_CODE_DESCRIPTIONS: Readonly<Record<ReportCode, string>> = {
  FIRST_RUN: 'no previous fingerprint, baseline recorded',
  STATUS_CHANGED: 'status output changed since the previous tick',
  STATUS_UNCHANGED: 'status output identical to the previous tick',
  PROBE_UNREACHABLE: 'management interface refused or dropped the connection',
  PROBE_TIMEOUT: 'management interface did not answer in time',
  BLOCKED_LOCK_HELD: 'another tick holds the state lock',
  BLOCKED_LOCK_CORRUPT: 'state lock file is corrupt and needs manual removal',
};
