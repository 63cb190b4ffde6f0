/**
 * Main tick execution runner.
 *
 * One tick per process, invoked at a fixed cadence by an external scheduler:
 * LOCK → PROBE → READ STATE → EVALUATE → [RECOVER → NOTIFY] → LOG → WRITE STATE → UNLOCK
 *
 * The scheduler is the only retry loop. A tick must therefore be safe to run
 * repeatedly: a restart that did not help is retried by a later tick once the
 * status output is seen unchanged again.
 */

import { hostname } from 'node:os';
import type { WatchdogConfig } from '../types/config.js';
import type { NotificationResult, ReportCode, RestartSummary, TickReport, Verdict } from '../types/report.js';
import { withLock, LockCorruptError, LockHeldError } from '../lib/lock.js';
import { probeStatus, ProbeError, ProbeTimeoutError, type ProbeResult } from '../lib/probe.js';
import { computeFingerprint } from '../lib/fingerprint.js';
import { evaluateFreeze } from '../lib/evaluate.js';
import {
  buildStateRecord,
  ensureStateDir,
  lockPathFor,
  readStateRecord,
  writeStateRecord,
} from '../lib/state.js';
import { recoverService, type RecoveryTrigger } from '../lib/recovery.js';
import { buildAlertMessage, sendAlert } from '../lib/notify.js';
import {
  appendLogRecord,
  formatTimestamp,
  generateRunId,
  renderBlockedLine,
  renderFailureBlock,
  renderSuccessLine,
  renderUnreachableLine,
} from '../lib/report.js';

const LOCK_POLL_MS = 250;

/**
 * Options for {@link runTick}.
 */
export interface TickOptions {
  /** Clock, replaceable in tests */
  now?: () => Date;
}

function isDebugEnabled(): boolean {
  return process.env.OVPN_WATCHDOG_DEBUG === '1';
}

interface TickContext {
  config: WatchdogConfig;
  runId: string;
  startedAt: Date;
  now: () => Date;
}

/**
 * Per-outcome report fields; the rest comes from the tick context.
 */
interface ReportFields {
  verdict: Verdict;
  code: ReportCode;
  fingerprint?: string | null;
  previous_fingerprint?: string | null;
  probe_error?: string | null;
  restart?: RestartSummary | null;
  notification?: NotificationResult | null;
  exit_code: number;
}

function buildReport(ctx: TickContext, fields: ReportFields): TickReport {
  const endedAt = ctx.now();
  return {
    run_id: ctx.runId,
    started_at: ctx.startedAt.toISOString(),
    ended_at: endedAt.toISOString(),
    duration_ms: endedAt.getTime() - ctx.startedAt.getTime(),
    verdict: fields.verdict,
    code: fields.code,
    fingerprint: fields.fingerprint ?? null,
    previous_fingerprint: fields.previous_fingerprint ?? null,
    probe_error: fields.probe_error ?? null,
    restart: fields.restart ?? null,
    notification: fields.notification ?? null,
    exit_code: fields.exit_code,
  };
}

/**
 * Appends to the outcome log. A log that cannot be written must not stop the
 * state update, so the failure is reported on stderr instead.
 */
async function writeLog(config: WatchdogConfig, record: string): Promise<void> {
  try {
    await appendLogRecord(config.log.path, record);
  } catch (error) {
    console.error(`Failed to write outcome log: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function describeCondition(trigger: RecoveryTrigger, config: WatchdogConfig): string {
  if (trigger.kind === 'frozen') {
    return `status output unchanged (${config.state.hash_algorithm}=${trigger.fingerprint})`;
  }
  return `management interface unreachable (${trigger.error.message})`;
}

/**
 * Restart, alert and log for a frozen or unreachable service.
 */
async function runRecovery(
  ctx: TickContext,
  trigger: RecoveryTrigger
): Promise<{ restart: RestartSummary; notification: NotificationResult }> {
  const { config } = ctx;
  const timestamp = formatTimestamp(ctx.now());
  const condition = describeCondition(trigger, config);

  console.warn(`${config.service.name}: ${condition}; restarting`);
  const outcome = await recoverService(config, trigger);

  const message = buildAlertMessage({
    hostname: hostname(),
    service: config.service.name,
    timestamp,
    condition,
    restart: outcome.restart,
    diagnostics: outcome.diagnostics,
  });
  const notification = await sendAlert(config.email, message);

  await writeLog(
    config,
    renderFailureBlock({
      timestamp,
      condition,
      diagnostics: outcome.diagnostics,
      restart: outcome.restart,
      notification,
    })
  );

  return { restart: outcome.restart, notification };
}

type ProbeOutcome = { ok: true; probe: ProbeResult } | { ok: false; error: ProbeError };

async function runProbe(config: WatchdogConfig): Promise<ProbeOutcome> {
  try {
    return { ok: true, probe: await probeStatus(config.management) };
  } catch (error) {
    if (error instanceof ProbeError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * The part of a tick that runs under the state lock.
 */
async function runLocked(ctx: TickContext): Promise<TickReport> {
  const { config } = ctx;
  const algorithm = config.state.hash_algorithm;

  const outcome = await runProbe(config);

  const stored = await readStateRecord(config.state.path);
  // A digest from another algorithm cannot be compared: treat as no history
  const previous = stored && stored.algorithm === algorithm ? stored.fingerprint : null;

  if (!outcome.ok) {
    const { error } = outcome;
    const code: ReportCode = error instanceof ProbeTimeoutError ? 'PROBE_TIMEOUT' : 'PROBE_UNREACHABLE';

    // No probe completed, so the stored fingerprint stays as it is
    if (config.policy.on_unreachable === 'log_only') {
      console.warn(`Management interface unreachable: ${error.message}`);
      await writeLog(config, renderUnreachableLine(formatTimestamp(ctx.now()), error.message));
      return buildReport(ctx, {
        verdict: 'unreachable',
        code,
        previous_fingerprint: previous,
        probe_error: error.message,
        exit_code: 0,
      });
    }

    const { restart, notification } = await runRecovery(ctx, { kind: 'unreachable', error });
    return buildReport(ctx, {
      verdict: 'unreachable',
      code,
      previous_fingerprint: previous,
      probe_error: error.message,
      restart,
      notification,
      exit_code: restart.exit_code,
    });
  }

  const { probe } = outcome;
  const fingerprint = computeFingerprint(probe.text, algorithm);
  const decision = evaluateFreeze(previous, fingerprint);
  if (isDebugEnabled()) {
    console.log(`[debug] previous=${previous ?? 'none'} current=${fingerprint} decision=${decision}`);
  }

  if (decision !== 'frozen') {
    const reason = decision === 'first_run' ? 'first_run' : 'status_changed';
    await writeLog(config, renderSuccessLine(formatTimestamp(ctx.now()), reason, algorithm, fingerprint));
    await writeStateRecord(config.state.path, buildStateRecord(fingerprint, algorithm, 'healthy', ctx.now()));
    return buildReport(ctx, {
      verdict: 'healthy',
      code: decision === 'first_run' ? 'FIRST_RUN' : 'STATUS_CHANGED',
      fingerprint,
      previous_fingerprint: previous,
      exit_code: 0,
    });
  }

  const { restart, notification } = await runRecovery(ctx, { kind: 'frozen', probe, fingerprint });
  await writeStateRecord(config.state.path, buildStateRecord(fingerprint, algorithm, 'frozen', ctx.now()));
  return buildReport(ctx, {
    verdict: 'frozen',
    code: 'STATUS_UNCHANGED',
    fingerprint,
    previous_fingerprint: previous,
    restart,
    notification,
    exit_code: restart.exit_code,
  });
}

/**
 * Executes a single tick.
 *
 * Lock failures abort the tick before any state is read and yield a blocked
 * report with exit code 1. State write failures propagate.
 *
 * @example
 * ```typescript
 * const { config } = await loadConfig();
 * const report = await runTick(config);
 * process.exitCode = report.exit_code;
 * ```
 */
export async function runTick(config: WatchdogConfig, options: TickOptions = {}): Promise<TickReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const ctx: TickContext = { config, runId: generateRunId(startedAt), startedAt, now };

  await ensureStateDir(config.state.path);
  const lockPath = lockPathFor(config.state.path);

  try {
    return await withLock(
      lockPath,
      { timeoutMs: config.state.lock_timeout_seconds * 1000, pollMs: LOCK_POLL_MS },
      () => runLocked(ctx)
    );
  } catch (error) {
    if (error instanceof LockHeldError) {
      console.error(`Another tick is running: ${error.message}`);
      await writeLog(config, renderBlockedLine(formatTimestamp(now()), 'lock_held', error.holder.pid));
      return buildReport(ctx, { verdict: 'blocked', code: 'BLOCKED_LOCK_HELD', exit_code: 1 });
    }
    if (error instanceof LockCorruptError) {
      console.error(error.message);
      await writeLog(config, renderBlockedLine(formatTimestamp(now()), 'lock_corrupt', null));
      return buildReport(ctx, { verdict: 'blocked', code: 'BLOCKED_LOCK_CORRUPT', exit_code: 1 });
    }
    throw error;
  }
}
