/**
 * Recovery actuator.
 *
 * Collects the diagnostics bundle and restarts the OpenVPN unit. Collection is
 * best effort: a failing collector becomes an entry describing the failure.
 * The restart runs exactly once per tick; the next scheduled tick re-probes
 * and, if needed, restarts again.
 */

import type { WatchdogConfig } from '../types/config.js';
import type { DiagnosticEntry, RestartSummary } from '../types/report.js';
import { probeLoadStats, type ProbeError, type ProbeResult } from './probe.js';
import { getServiceStatus, restartService } from './service.js';

/**
 * Why recovery was triggered.
 */
export type RecoveryTrigger =
  | { kind: 'frozen'; probe: ProbeResult; fingerprint: string }
  | { kind: 'unreachable'; error: ProbeError };

/**
 * Diagnostics and restart outcome of one recovery.
 */
export interface RecoveryOutcome {
  diagnostics: DiagnosticEntry[];
  restart: RestartSummary;
}

/**
 * How a management query is shown in the log, e.g. `management 127.0.0.1:38248 "status"`.
 */
export function describeQuery(host: string, port: number, command: string): string {
  return `management ${host}:${port} "${command}"`;
}

async function collectServiceStatus(config: WatchdogConfig): Promise<DiagnosticEntry> {
  const result = await getServiceStatus(config.service);
  return {
    label: 'service status',
    command: result.command,
    exit_code: result.exit_code,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

async function collectLoadStats(config: WatchdogConfig): Promise<DiagnosticEntry> {
  const { host, port, load_stats_command } = config.management;
  const command = describeQuery(host, port, load_stats_command);
  try {
    const result = await probeLoadStats(config.management);
    return { label: 'load statistics', command, exit_code: 0, stdout: result.text, stderr: '' };
  } catch (error) {
    return {
      label: 'load statistics',
      command,
      exit_code: 1,
      stdout: '',
      stderr: error instanceof Error ? error.message : String(error),
    };
  }
}

function statusProbeEntry(config: WatchdogConfig, trigger: RecoveryTrigger): DiagnosticEntry {
  const { host, port, status_command } = config.management;
  const command = describeQuery(host, port, status_command);
  if (trigger.kind === 'frozen') {
    return { label: 'status probe', command, exit_code: 0, stdout: trigger.probe.text, stderr: '' };
  }
  return { label: 'status probe', command, exit_code: 1, stdout: '', stderr: trigger.error.message };
}

/**
 * Gathers the diagnostics bundle: service status, load statistics, and the
 * status probe that triggered recovery.
 *
 * Never rejects.
 */
export async function collectDiagnostics(
  config: WatchdogConfig,
  trigger: RecoveryTrigger
): Promise<DiagnosticEntry[]> {
  const serviceStatus = await collectServiceStatus(config);
  const loadStats = await collectLoadStats(config);
  return [serviceStatus, loadStats, statusProbeEntry(config, trigger)];
}

/**
 * Collects diagnostics, then restarts the service unit.
 */
export async function recoverService(
  config: WatchdogConfig,
  trigger: RecoveryTrigger
): Promise<RecoveryOutcome> {
  const diagnostics = await collectDiagnostics(config, trigger);

  const result = await restartService(config.service);
  if (result.exit_code !== 0) {
    console.error(`Restart of ${config.service.name} exited with ${result.exit_code}`);
  }

  return {
    diagnostics,
    restart: {
      command: result.command,
      exit_code: result.exit_code,
      stdout: result.stdout,
      stderr: result.stderr,
    },
  };
}
