/**
 * Clock abstraction
 *
 * Every wait in the acquisition path (rate limiting, retry backoff, the
 * refresh loop) goes through an injected Clock so tests can run on
 * virtual time.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from '../errors/index.js';

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
  /** Resolves after `ms`; rejects with CancelledError if the signal fires first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError('sleep');
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError('sleep');
      throw err;
    }
  }
};
