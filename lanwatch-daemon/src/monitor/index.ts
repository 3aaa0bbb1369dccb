/**
 * Monitor loop.
 *
 * Runs one cycle at a time; the next cycle starts `max(1, interval - elapsed)`
 * seconds after the previous one finished. Aborting the signal interrupts the
 * wait; a cycle in progress always runs to completion.
 */

import { debugLog } from '../config.js';
import { runCycle, type MonitorDeps } from './cycle.js';

export interface LoopOptions {
  intervalSeconds: number;
  /** Attach a startup report to the first cycle */
  startupReport?: boolean;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

/** Minimum gap between the end of one cycle and the start of the next */
export const MIN_DELAY_SECONDS = 1;

export function nextDelaySeconds(intervalSeconds: number, elapsedSeconds: number): number {
  return Math.max(MIN_DELAY_SECONDS, intervalSeconds - elapsedSeconds);
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run cycles until `signal` aborts. Returns the number of completed cycles.
 * An unexpected error inside a cycle is logged and the loop carries on.
 */
export async function runForever(deps: MonitorDeps, options: LoopOptions): Promise<number> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const { signal } = options;
  let cycles = 0;

  console.log(`[Monitor] Started, scan interval ${options.intervalSeconds}s`);

  while (!signal?.aborted) {
    const startedAt = now();
    try {
      await runCycle(deps, { startupReport: options.startupReport === true && cycles === 0 });
    } catch (err) {
      console.error('[Monitor] Cycle error:', err instanceof Error ? err.message : err);
    }
    cycles += 1;

    if (signal?.aborted) break;

    const elapsed = (now() - startedAt) / 1000;
    const delay = nextDelaySeconds(options.intervalSeconds, elapsed);
    debugLog(`[Monitor] Cycle took ${elapsed.toFixed(2)}s, next scan in ${delay.toFixed(2)}s`);
    await wait(delay * 1000, signal);
  }

  console.log(`[Monitor] Stopped after ${cycles} cycles`);
  return cycles;
}
