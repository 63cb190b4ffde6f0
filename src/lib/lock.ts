/**
 * Lock mechanism for preventing overlapping ticks.
 *
 * Implements crash-safe lock acquisition with boot_id tracking to enable
 * safe reclaim of stale locks after crashes or reboots. The lock file is
 * published with link(2), so it appears fully written or not at all and two
 * processes can never both create it.
 */

import { execFileSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { link, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { hostname, uptime } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import type { AcquireLockOptions, LockInfo } from '../types/lock.js';
import { AtomicFsError, errnoCode, isNotFound } from './fs.js';

const DEFAULT_POLL_MS = 200;

/**
 * Error thrown when a lock is already held by another process.
 */
export class LockHeldError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly holder: LockInfo
  ) {
    super(message);
    this.name = 'LockHeldError';
  }
}

/**
 * Error thrown when a lock file is corrupt or malformed.
 */
export class LockCorruptError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string
  ) {
    super(message);
    this.name = 'LockCorruptError';
  }
}

/** Cached boot ID to avoid repeated reads */
let cachedBootId: string | null = null;

/**
 * Extracts the boot time in seconds from `sysctl -n kern.boottime` output,
 * e.g. `{ sec = 1700000000, usec = 123456 } Tue Nov 14 22:13:20 2023`.
 */
export function parseBootTime(sysctlOutput: string): number | null {
  const match = /sec\s*=\s*(\d+)/.exec(sysctlOutput);
  return match ? Number(match[1]) : null;
}

/**
 * Boot identifier derived from the current time and system uptime.
 *
 * The computed boot time drifts by up to a second between processes, so it
 * is rounded to the nearest 10 seconds.
 */
export function bootIdFromUptime(host: string, nowMs: number, uptimeSeconds: number): string {
  const bootSeconds = nowMs / 1000 - uptimeSeconds;
  return `${host}-${Math.round(bootSeconds / 10) * 10}`;
}

/**
 * Gets a unique identifier for the current boot session.
 *
 * On Linux, reads /proc/sys/kernel/random/boot_id. On macOS, uses the
 * hostname and `kern.boottime`. Elsewhere falls back to the boot time
 * derived from the system uptime.
 *
 * The result is cached for the lifetime of the process.
 */
export function getBootId(): string {
  if (cachedBootId !== null) {
    return cachedBootId;
  }

  if (process.platform === 'linux') {
    try {
      cachedBootId = readFileSync('/proc/sys/kernel/random/boot_id', 'utf-8').trim();
      return cachedBootId;
    } catch (error) {
      console.warn(`Cannot read boot_id, falling back to uptime: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (process.platform === 'darwin') {
    try {
      const bootTime = parseBootTime(execFileSync('sysctl', ['-n', 'kern.boottime'], { encoding: 'utf-8' }));
      if (bootTime !== null) {
        cachedBootId = `${hostname()}-${bootTime}`;
        return cachedBootId;
      }
    } catch (error) {
      console.warn(`Cannot read kern.boottime, falling back to uptime: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  cachedBootId = bootIdFromUptime(hostname(), Date.now(), uptime());
  return cachedBootId;
}

/**
 * Checks if a process with the given PID is currently running.
 *
 * Uses process.kill(pid, 0) which checks for process existence
 * without actually sending a signal.
 */
export function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // ESRCH = no such process, EPERM = exists but no permission
    return errnoCode(error) === 'EPERM';
  }
}

/**
 * Determines if a lock is stale and can be reclaimed.
 *
 * A lock is considered stale if:
 * - The holding process is no longer running, OR
 * - The boot_id differs from the current boot (system has rebooted)
 */
export function isLockStale(lock: LockInfo): boolean {
  if (lock.boot_id !== getBootId()) {
    return true;
  }
  return !isPidRunning(lock.pid);
}

/**
 * Validates that a parsed value is a valid LockInfo object.
 *
 * @throws {LockCorruptError} If the value is not a valid LockInfo
 */
function validateLockShape(lockPath: string, value: unknown): asserts value is LockInfo {
  const remediation = `Delete the lock file at ${lockPath} and retry.`;

  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new LockCorruptError(
      `Lock file has invalid structure (expected object, got ${value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value}). ${remediation}`,
      lockPath
    );
  }

  const obj = value as Record<string, unknown>;

  if (typeof obj.pid !== 'number' || !Number.isInteger(obj.pid) || obj.pid <= 0) {
    throw new LockCorruptError(
      `Lock file has invalid pid (expected integer > 0, got ${JSON.stringify(obj.pid)}). ${remediation}`,
      lockPath
    );
  }

  if (typeof obj.started_at !== 'string' || obj.started_at === '') {
    throw new LockCorruptError(
      `Lock file has invalid started_at (expected non-empty string, got ${JSON.stringify(obj.started_at)}). ${remediation}`,
      lockPath
    );
  }

  if (typeof obj.boot_id !== 'string' || obj.boot_id === '') {
    throw new LockCorruptError(
      `Lock file has invalid boot_id (expected non-empty string, got ${JSON.stringify(obj.boot_id)}). ${remediation}`,
      lockPath
    );
  }
}

/**
 * Reads the current lock holder.
 *
 * @returns The holder, or null if the lock file vanished in the meantime
 * @throws {LockCorruptError} If the lock file is not a valid lock
 */
async function readLockHolder(lockPath: string): Promise<LockInfo | null> {
  let content: string;
  try {
    content = await readFile(lockPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw new AtomicFsError(
      `Failed to read lock file ${lockPath}: ${error instanceof Error ? error.message : String(error)}`,
      lockPath,
      error instanceof Error ? error : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new LockCorruptError(
      `Lock file contains invalid JSON. Delete the lock file at ${lockPath} and retry.`,
      lockPath
    );
  }

  validateLockShape(lockPath, parsed);
  return parsed;
}

/**
 * Tries to create the lock file exclusively.
 *
 * @returns true if this process now owns the lock, false if a lock file exists
 */
async function tryCreateLock(lockPath: string, lockInfo: LockInfo): Promise<boolean> {
  const tmpPath = `${lockPath}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, JSON.stringify(lockInfo, null, 2) + '\n', { encoding: 'utf-8', mode: 0o640 });
    await link(tmpPath, lockPath);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'EEXIST') {
      return false;
    }
    throw new AtomicFsError(
      `Failed to create lock file ${lockPath}: ${error instanceof Error ? error.message : String(error)}`,
      lockPath,
      error instanceof Error ? error : undefined
    );
  } finally {
    await unlink(tmpPath).catch((error: unknown) => {
      if (!isNotFound(error)) {
        console.warn(`Failed to remove ${tmpPath}: ${String(error)}`);
      }
    });
  }
}

function sameHolder(a: LockInfo, b: LockInfo): boolean {
  return a.pid === b.pid && a.started_at === b.started_at && a.boot_id === b.boot_id;
}

async function unlinkIfPresent(path: string): Promise<void> {
  await unlink(path).catch((error: unknown) => {
    if (!isNotFound(error)) {
      throw error;
    }
  });
}

/**
 * Deletes `path` only if it still holds `expected`.
 *
 * The file is first renamed to a path private to this process, so a file
 * written after `expected` was read is never deleted; such a file is put back.
 *
 * @returns true if the file held `expected` and was deleted
 */
async function removeIfHeldBy(path: string, expected: LockInfo): Promise<boolean> {
  const privatePath = `${path}.${process.pid}.stale`;
  try {
    await rename(path, privatePath);
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }

  try {
    const moved = await readLockHolder(privatePath);
    if (moved !== null && sameHolder(moved, expected)) {
      return true;
    }
    await link(privatePath, path).catch((error: unknown) => {
      if (errnoCode(error) !== 'EEXIST') {
        throw error;
      }
    });
    return false;
  } finally {
    await unlinkIfPresent(privatePath);
  }
}

/**
 * Deletes the lock file if it still belongs to `stale`.
 *
 * Contenders that saw the same dead holder must not each delete the lock,
 * or a late one would remove the fresh lock of an earlier one. Deletion of a
 * foreign lock therefore only happens while holding the `<lock>.reclaim`
 * guard, and only once the lock file is confirmed to still hold `stale`.
 *
 * @returns null once the lock file no longer belongs to `stale` (retry the
 *   acquisition), or the live process currently holding the guard
 */
export async function reclaimStaleLock(lockPath: string, stale: LockInfo): Promise<LockInfo | null> {
  const guardPath = `${lockPath}.reclaim`;
  const guard: LockInfo = {
    pid: process.pid,
    started_at: new Date().toISOString(),
    boot_id: getBootId(),
  };

  if (!(await tryCreateLock(guardPath, guard))) {
    const reclaimer = await readLockHolder(guardPath);
    if (reclaimer === null) {
      return null;
    }
    if (isLockStale(reclaimer)) {
      console.warn(`Removing reclaim guard abandoned by PID ${reclaimer.pid}`);
      await removeIfHeldBy(guardPath, reclaimer);
      return null;
    }
    return reclaimer;
  }

  try {
    if (await removeIfHeldBy(lockPath, stale)) {
      console.warn(
        `Reclaimed stale lock from PID ${stale.pid} (started_at: ${stale.started_at}, boot_id: ${stale.boot_id})`
      );
    }
    return null;
  } finally {
    await unlinkIfPresent(guardPath).catch((error: unknown) => {
      console.warn(`Failed to remove ${guardPath}: ${error instanceof Error ? error.message : String(error)}`);
    });
  }
}

/**
 * Acquires a lock by creating a lock file atomically.
 *
 * If a lock already exists:
 * - If stale (process dead or different boot), reclaims it with a warning
 *   through `reclaimStaleLock`
 * - If held by an active process, retries every `pollMs` until `timeoutMs`
 *   has elapsed, then throws LockHeldError
 *
 * @returns The lock information that was written
 * @throws {LockHeldError} If the lock is still held by another active process at the deadline
 * @throws {LockCorruptError} If the lock file is corrupt or malformed
 * @throws {AtomicFsError} If the lock file cannot be written
 */
export async function acquireLock(lockPath: string, options: AcquireLockOptions = {}): Promise<LockInfo> {
  const timeoutMs = options.timeoutMs ?? 0;
  const pollMs = options.pollMs ?? DEFAULT_POLL_MS;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    const lockInfo: LockInfo = {
      pid: process.pid,
      started_at: new Date().toISOString(),
      boot_id: getBootId(),
    };

    if (await tryCreateLock(lockPath, lockInfo)) {
      return lockInfo;
    }

    const holder = await readLockHolder(lockPath);
    if (holder === null) {
      // Released between our create attempt and the read
      continue;
    }

    if (isLockStale(holder)) {
      const reclaimer = await reclaimStaleLock(lockPath, holder);
      if (reclaimer === null) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new LockHeldError(
          `Lock is being reclaimed by PID ${reclaimer.pid} (started_at: ${reclaimer.started_at})`,
          lockPath,
          reclaimer
        );
      }
      await sleep(Math.min(pollMs, Math.max(1, deadline - Date.now())));
      continue;
    }

    if (Date.now() >= deadline) {
      throw new LockHeldError(
        `Lock is held by PID ${holder.pid} (started_at: ${holder.started_at})`,
        lockPath,
        holder
      );
    }

    await sleep(Math.min(pollMs, Math.max(1, deadline - Date.now())));
  }
}

/**
 * Releases a lock by deleting the lock file.
 *
 * Only releases the lock if it belongs to the current process. A missing or
 * foreign lock is left alone; other failures are reported as warnings since
 * the tick's own outcome is already decided.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  try {
    const lock = await readLockHolder(lockPath);
    if (lock && lock.pid === process.pid && lock.boot_id === getBootId()) {
      await unlink(lockPath);
    }
  } catch (error) {
    if (isNotFound(error)) {
      return;
    }
    console.warn(`Failed to release lock ${lockPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Runs `fn` while holding the lock, releasing it on every exit path.
 *
 * @example
 * ```typescript
 * const verdict = await withLock(lockPath, { timeoutMs: 10_000 }, async () => {
 *   const previous = await readStateRecord(statePath);
 *   ...
 * });
 * ```
 */
export async function withLock<T>(
  lockPath: string,
  options: AcquireLockOptions,
  fn: (lock: LockInfo) => Promise<T>
): Promise<T> {
  const lock = await acquireLock(lockPath, options);
  try {
    return await fn(lock);
  } finally {
    await releaseLock(lockPath);
  }
}
