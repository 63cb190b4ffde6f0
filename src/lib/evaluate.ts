/**
 * Freeze evaluation.
 *
 * Pure decision over two fingerprints. Its correctness rests on the probe
 * output being stable for a stuck server and changing between ticks for a
 * live one.
 */

/**
 * Outcome of comparing the current fingerprint with the stored one.
 *
 * - first_run: nothing stored yet, so no judgement is possible (healthy)
 * - changed: output moved since the previous tick (healthy)
 * - frozen: output identical to the previous tick
 */
export type FreezeDecision = 'first_run' | 'changed' | 'frozen';

export function evaluateFreeze(previous: string | null, current: string): FreezeDecision {
  if (previous === null) {
    return 'first_run';
  }
  return previous === current ? 'frozen' : 'changed';
}
