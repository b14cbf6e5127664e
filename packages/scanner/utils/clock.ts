// Injectable time source. Token buckets and retry back-off read time only through a Clock.

import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from './errors.js';

export interface Clock {
  /** Milliseconds since an arbitrary origin. */
  now(): number;
  /** Resolves after `ms`; rejects with CancelledError if `signal` aborts first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    if (ms <= 0) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      throw err;
    }
  },
};
