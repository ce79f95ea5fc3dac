import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Longest single timer Node accepts; larger values fire after 1 ms
 */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Sleep for `ms`, rejecting with the signal's reason if it aborts first.
 * Delays past the timer ceiling are slept in chunks.
 */
export async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (Number.isNaN(ms) || ms === Number.POSITIVE_INFINITY) {
    throw new RangeError(`Invalid delay: ${ms}`);
  }
  signal?.throwIfAborted();

  let remaining = ms;
  try {
    while (remaining > 0) {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      await sleep(chunk, undefined, { signal });
      remaining -= chunk;
    }
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    throw error;
  }
}
