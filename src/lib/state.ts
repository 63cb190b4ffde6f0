/**
 * Fingerprint store.
 *
 * Reads and writes the state record that carries the last status fingerprint
 * from one tick to the next. Callers hold the state lock (see lock.ts) for
 * the whole read-compare-write span; nothing here locks on its own.
 */

import { chmod, mkdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { HashAlgorithm } from '../types/config.js';
import type { Verdict } from '../types/report.js';
import { STATE_RECORD_VERSION, type StateRecord } from '../types/state.js';
import { atomicReadJson, atomicWriteJson, errnoCode, isNotFound } from './fs.js';
import { isFingerprint } from './fingerprint.js';

export const STATE_DIR_MODE = 0o750;
export const STATE_FILE_MODE = 0o640;

const VERDICTS: ReadonlySet<string> = new Set<Verdict>(['healthy', 'frozen', 'unreachable', 'blocked']);

/**
 * Path of the lock file guarding a state file: `.<name>.lock` in the same directory.
 */
export function lockPathFor(statePath: string): string {
  return join(dirname(statePath), `.${basename(statePath)}.lock`);
}

/**
 * Creates the state directory and restricts its permissions.
 *
 * Tightening the mode is best effort: a directory owned by another user keeps
 * its mode (EPERM) and the tick carries on.
 */
export async function ensureStateDir(statePath: string): Promise<void> {
  const dir = dirname(statePath);
  await mkdir(dir, { recursive: true, mode: STATE_DIR_MODE });
  try {
    await chmod(dir, STATE_DIR_MODE);
  } catch (error) {
    const code = errnoCode(error);
    if (code !== 'EPERM' && code !== 'EACCES') {
      throw error;
    }
    if (process.env.OVPN_WATCHDOG_DEBUG === '1') {
      console.warn(`[debug] cannot restrict permissions of ${dir}: ${code}`);
    }
  }
}

/**
 * Type guard for a parsed state record.
 */
export function isStateRecord(value: unknown): value is StateRecord {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const r = value as Record<string, unknown>;
  if (r.version !== STATE_RECORD_VERSION) return false;
  const algorithm = r.algorithm;
  if (algorithm !== 'md5' && algorithm !== 'sha256') return false;
  if (!isFingerprint(r.fingerprint, algorithm)) return false;
  if (typeof r.updated_at !== 'string') return false;
  if (typeof r.last_verdict !== 'string' || !VERDICTS.has(r.last_verdict)) return false;
  return true;
}

/**
 * Reads the state record.
 *
 * A missing file means no previous tick. An unreadable or malformed file is
 * reported and also treated as absent, so this tick re-seeds it.
 */
export async function readStateRecord(statePath: string): Promise<StateRecord | null> {
  let raw: unknown;
  try {
    raw = await atomicReadJson(statePath);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    console.warn(`Ignoring unreadable state record: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  if (!isStateRecord(raw)) {
    console.warn(`Ignoring malformed state record at ${statePath}`);
    return null;
  }
  return raw;
}

/**
 * Builds the record written at the end of a tick.
 */
export function buildStateRecord(
  fingerprint: string,
  algorithm: HashAlgorithm,
  verdict: Verdict,
  now: Date = new Date()
): StateRecord {
  return {
    version: STATE_RECORD_VERSION,
    fingerprint,
    algorithm,
    updated_at: now.toISOString(),
    last_verdict: verdict,
  };
}

/**
 * Atomically replaces the state record (mode 0640).
 *
 * @throws {AtomicFsError} If the record cannot be written
 */
export async function writeStateRecord(statePath: string, record: StateRecord): Promise<void> {
  await atomicWriteJson(statePath, record, { mode: STATE_FILE_MODE });
}
