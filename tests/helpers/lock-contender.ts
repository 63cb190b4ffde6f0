/**
 * Child process used by the multi-process lock tests.
 *
 * Usage: lock-contender.ts <lockPath> <startAtMs> <holdMs>
 *
 * Waits until `startAtMs`, tries the lock once and prints either
 * `acquired <start> <end>` or `held`.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { acquireLock, LockHeldError, releaseLock } from '../../src/lib/lock.js';

async function main(): Promise<void> {
  const [lockPath, startAtArg, holdArg] = process.argv.slice(2);
  if (lockPath === undefined || startAtArg === undefined || holdArg === undefined) {
    throw new Error('usage: lock-contender.ts <lockPath> <startAtMs> <holdMs>');
  }

  await sleep(Math.max(0, Number(startAtArg) - Date.now()));

  try {
    await acquireLock(lockPath, { timeoutMs: 0 });
  } catch (error) {
    if (error instanceof LockHeldError) {
      console.log('held');
      return;
    }
    throw error;
  }

  const start = Date.now();
  await sleep(Number(holdArg));
  const end = Date.now();
  await releaseLock(lockPath);
  console.log(`acquired ${start} ${end}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
