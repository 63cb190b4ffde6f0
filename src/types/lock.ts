/**
 * Lock mechanism type definitions.
 *
 * These types support the lock acquisition/release system that keeps two
 * overlapping ticks (timer run and manual run, or a slow tick and the next
 * timer firing) from interleaving their state reads and writes.
 */

/**
 * Information stored in the lock file.
 *
 * This structure enables crash-safe lock reclaim by storing enough
 * information to determine if the lock holder is still running.
 */
export interface LockInfo {
  /** Process ID that holds the lock */
  pid: number;
  /** ISO timestamp when lock was acquired */
  started_at: string;
  /** Unique identifier for the current boot session */
  boot_id: string;
}

/**
 * Options controlling how long acquisition waits for a live holder.
 */
export interface AcquireLockOptions {
  /** Total time to keep retrying while another live process holds the lock (0 = fail immediately) */
  timeoutMs?: number;
  /** Delay between retries */
  pollMs?: number;
}
