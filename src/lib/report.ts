/**
 * Outcome log rendering.
 *
 * The outcome log is a plaintext, append-only file meant for `tail -f`:
 * one line per passing tick, one delimited block per recovery.
 */

import { randomBytes } from 'node:crypto';
import type { HashAlgorithm } from '../types/config.js';
import type { DiagnosticEntry, NotificationResult, RestartSummary } from '../types/report.js';
import { appendText } from './fs.js';

export const SEPARATOR_WIDTH = 80;
const SEPARATOR = '='.repeat(SEPARATOR_WIDTH);

/**
 * Generates a unique run ID for a tick.
 *
 * Format: timestamp + random suffix (hex encoded)
 * Example: "2026-10-18T12-03-12Z-a1b2c3d4e5f60718"
 */
export function generateRunId(now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-').substring(0, 19) + 'Z';
  const randomSuffix = randomBytes(8).toString('hex');
  return `${timestamp}-${randomSuffix}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a local timestamp with UTC offset, seconds precision.
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date()); // "2026-10-18T14:03:12+02:00"
 * ```
 */
export function formatTimestamp(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absOffset = Math.abs(offsetMinutes);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`
  );
}

/**
 * `<ts> SUCCESS probe <first_run|status_changed> <algorithm>=<fingerprint>`
 */
export function renderSuccessLine(
  timestamp: string,
  reason: 'first_run' | 'status_changed',
  algorithm: HashAlgorithm,
  fingerprint: string
): string {
  return `${timestamp} SUCCESS probe ${reason} ${algorithm}=${fingerprint}`;
}

/**
 * `<ts> BLOCKED <reason> pid=<holder>`
 */
export function renderBlockedLine(timestamp: string, reason: 'lock_held' | 'lock_corrupt', holderPid: number | null): string {
  return `${timestamp} BLOCKED ${reason}${holderPid === null ? '' : ` pid=${holderPid}`}`;
}

/**
 * `<ts> UNREACHABLE probe <error>`, logged when the unreachable policy is log_only.
 */
export function renderUnreachableLine(timestamp: string, error: string): string {
  return `${timestamp} UNREACHABLE probe ${error.replace(/\s+/g, ' ').trim()}`;
}

/**
 * Renders a notifier outcome for the log.
 */
export function describeNotification(result: NotificationResult): string {
  switch (result.status) {
    case 'sent':
      return `sent to ${result.recipients.join(', ')}`;
    case 'disabled':
      return 'disabled';
    case 'skipped':
      return `skipped (${result.reason})`;
    case 'failed':
      return `failed (${result.error})`;
  }
}

/**
 * Data for a recovery block.
 */
export interface FailureBlockData {
  timestamp: string;
  condition: string;
  diagnostics: DiagnosticEntry[];
  restart: RestartSummary;
  notification: NotificationResult;
}

/**
 * Renders the multi-line record of a recovery.
 */
export function renderFailureBlock(data: FailureBlockData): string {
  const block: string[] = [
    SEPARATOR,
    `Timestamp: ${data.timestamp}`,
    `Condition: ${data.condition}`,
    '',
  ];

  for (const entry of data.diagnostics) {
    block.push(`Command: ${entry.command}`);
    block.push(`Return code: ${entry.exit_code}`);
    if (entry.stderr.trim()) {
      block.push('STDERR:');
      block.push(entry.stderr.replace(/\n+$/, ''));
    }
    block.push('STDOUT:');
    block.push(entry.stdout.replace(/\n+$/, ''));
    block.push('');
  }

  block.push(`Action: ${data.restart.command}`);
  block.push(`Restart return code: ${data.restart.exit_code}`);
  if (data.restart.stderr.trim()) {
    block.push('Restart STDERR:');
    block.push(data.restart.stderr.replace(/\n+$/, ''));
  }
  if (data.restart.stdout.trim()) {
    block.push('Restart STDOUT:');
    block.push(data.restart.stdout.replace(/\n+$/, ''));
  }
  block.push(`Notification: ${describeNotification(data.notification)}`);
  block.push(SEPARATOR);
  block.push('');

  return block.join('\n');
}

/**
 * Appends one record to the outcome log.
 *
 * @throws {AtomicFsError} If the log cannot be written
 */
export async function appendLogRecord(logPath: string, record: string): Promise<void> {
  await appendText(logPath, record);
}
