/**
 * Report types for ovpn-watchdog tick results.
 *
 * A TickReport is printed by `ovpn-watchdog check` (as JSON with --json) and
 * drives the process exit code. The persistent record of a tick is the
 * plaintext outcome log, not this structure.
 */

import type { ReportCode } from '../constants/report_codes.js';

export type { ReportCode };

/**
 * Verdict of a tick.
 *
 * - healthy: status output changed, or first run
 * - frozen: status output identical to the previous tick
 * - unreachable: the management interface could not be queried
 * - blocked: the tick did not run (lock not acquired)
 */
export type Verdict = 'healthy' | 'frozen' | 'unreachable' | 'blocked';

/**
 * One item of the diagnostics bundle collected before a restart.
 */
export interface DiagnosticEntry {
  /** Short label, e.g. "service status" */
  label: string;
  /** Command or query that produced the output, as shown in the log */
  command: string;
  /** Exit code (0 for a successful management query, non-zero on failure) */
  exit_code: number;
  stdout: string;
  stderr: string;
}

/**
 * Outcome of the alert notifier.
 */
export type NotificationResult =
  | { status: 'sent'; recipients: string[]; message_id: string }
  | { status: 'disabled' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

/**
 * Restart attempt summary.
 */
export interface RestartSummary {
  /** Command line that was run */
  command: string;
  exit_code: number;
  stdout: string;
  stderr: string;
}

/**
 * Summary of one tick.
 */
export interface TickReport {
  /** Unique ID of this tick */
  run_id: string;
  /** ISO timestamp when the tick started */
  started_at: string;
  /** ISO timestamp when the tick ended */
  ended_at: string;
  /** Tick duration in milliseconds */
  duration_ms: number;
  verdict: Verdict;
  code: ReportCode;
  /** Fingerprint of this tick's status probe, null when the probe failed or the tick was blocked */
  fingerprint: string | null;
  /** Fingerprint read from the state record, null when absent */
  previous_fingerprint: string | null;
  /** Probe error message when verdict is unreachable */
  probe_error: string | null;
  /** Restart attempt, null when no restart was issued */
  restart: RestartSummary | null;
  /** Notifier outcome, null when no alert was due */
  notification: NotificationResult | null;
  /** Process exit code reported to the scheduler */
  exit_code: number;
}
